export class LogSinkError extends Error {
    readonly filePath: string;

    constructor(message: string, filePath: string, cause?: unknown) {
        super(message, { cause });
        this.name = 'LogSinkError';
        this.filePath = filePath;
    }

    /**
     * Single-line description including the underlying cause, as printed to stderr.
     */
    describe(): string {
        const cause = this.cause;
        if (cause === undefined) {
            return this.message;
        }
        const detail = cause instanceof Error ? cause.message : String(cause);
        return `${this.message} (${detail})`;
    }
}
