import fs from 'fs';
import path from 'path';

const LOG_FILE_NAME = 'debug.log';

let logFile: string | null = null;
let disabled = false;

const resolveLogFile = (): string => {
    const dir = process.env.TICKLOG_DEBUG_DIR || 'logs';
    return path.join(dir, LOG_FILE_NAME);
};

// Truncate on the first write of each process
const ensureLogFile = (): string => {
    if (logFile) {
        return logFile;
    }
    const file = resolveLogFile();
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, '');
    logFile = file;
    return file;
};

export const addLog = (message: string) => {
    if (disabled) {
        return;
    }
    const now = new Date();
    const timestamp = now.toLocaleTimeString();
    const milliseconds = now.getMilliseconds().toString().padStart(3, '0');
    try {
        fs.appendFileSync(ensureLogFile(), `[${timestamp}.${milliseconds}] ${message}\n`);
    } catch (error) {
        disabled = true;
        process.stderr.write(
            `Diagnostics log disabled: ${error instanceof Error ? error.message : String(error)}\n`
        );
    }
};

/**
 * Path of the diagnostics file once it has been created, null before the first write.
 */
export const getLogFilePath = (): string | null => logFile;

/**
 * Forget the current diagnostics file so the next write re-reads TICKLOG_DEBUG_DIR.
 */
export const resetLogger = () => {
    logFile = null;
    disabled = false;
};
