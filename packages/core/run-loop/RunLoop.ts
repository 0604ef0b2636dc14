import { addLog } from '@ticklog/shared/logger';
import { formatLogEntry, formatTimestamp } from '../format.js';
import { LogSink } from '../log-sink.js';
import { sleep } from '../sleep.js';
import type { LogSinkError } from '../errors.js';
import type { RunConfig, RunPhase, RunSummary, SinkResult, SleepOutcome, StopReason } from '../types/Run.js';
import type { RunCallback } from './RunCallback.js';

export const STARTUP_BANNER = 'Starting Java Application...';
export const FINISHED_LINE = 'Application finished.';

/**
 * The subset of LogSink the loop relies on
 */
export interface RunSink {
    writeLine(line: string): Promise<SinkResult<void>>;
    close(): Promise<SinkResult<void>>;
}

export interface RunLoopDeps {
    openSink: (filePath: string) => Promise<SinkResult<RunSink>>;
    sleep: (ms: number, signal?: AbortSignal) => Promise<SleepOutcome>;
    clock: () => Date;
    stdout: (line: string) => void;
    stderr: (line: string) => void;
}

const defaultDeps: RunLoopDeps = {
    openSink: filePath => LogSink.open(filePath),
    sleep,
    clock: () => new Date(),
    stdout: line => console.log(line),
    stderr: line => console.error(line),
};

const ALLOWED_TRANSITIONS: Record<RunPhase, RunPhase[]> = {
    STARTING: ['RUNNING', 'STOPPING'],
    RUNNING: ['STOPPING'],
    STOPPING: ['DONE'],
    DONE: [],
};

export function canTransition(from: RunPhase, to: RunPhase): boolean {
    return ALLOWED_TRANSITIONS[from].includes(to);
}

/**
 * RunLoop - timed logging run
 *
 * STARTING → RUNNING(i = 1..N) → STOPPING → DONE. STARTING skips straight to
 * STOPPING when the log file cannot be opened. Interruption is only observed
 * during the pause between iterations.
 */
export class RunLoop {
    private readonly config: RunConfig;
    private readonly deps: RunLoopDeps;
    private readonly callbacks: RunCallback[] = [];
    private phase: RunPhase = 'STARTING';
    private started = false;

    constructor(config: RunConfig, deps: Partial<RunLoopDeps> = {}) {
        this.config = config;
        this.deps = { ...defaultDeps, ...deps };
    }

    get currentPhase(): RunPhase {
        return this.phase;
    }

    addCallback(callback: RunCallback): void {
        this.callbacks.push(callback);
    }

    async run(signal?: AbortSignal): Promise<RunSummary> {
        if (this.started) {
            throw new Error('RunLoop.run() may only be called once');
        }
        this.started = true;

        const { iterations, logFilePath } = this.config;
        this.deps.stdout(STARTUP_BANNER);
        this.deps.stdout(`Will run for ${iterations} iterations.`);

        let reason: StopReason = 'completed';
        let failure: LogSinkError | undefined;
        let iterationsRun = 0;

        const opened = await this.deps.openSink(logFilePath);
        let sink: RunSink | undefined;

        if (opened.ok) {
            sink = opened.value;
            this.transition('RUNNING');
            const result = await this.iterate(sink, signal);
            reason = result.reason;
            failure = result.error;
            iterationsRun = result.iterationsRun;
        } else {
            reason = 'io-error';
            failure = opened.error;
            this.reportFailure(opened.error);
        }

        this.transition('STOPPING');

        if (sink) {
            const closed = await sink.close();
            if (!closed.ok) {
                this.reportFailure(closed.error);
                if (!failure) {
                    reason = 'io-error';
                    failure = closed.error;
                }
            }
        }

        this.transition('DONE');
        this.deps.stdout(FINISHED_LINE);

        const summary: RunSummary = { reason, iterationsRun, logFilePath };
        if (failure) {
            summary.error = failure;
        }
        addLog(`[run] Stopped: ${reason} after ${iterationsRun}/${iterations} iterations`);
        this.notify(cb => cb.onStop?.(summary));
        return summary;
    }

    private async iterate(
        sink: RunSink,
        signal?: AbortSignal
    ): Promise<{ reason: StopReason; iterationsRun: number; error?: LogSinkError }> {
        const { iterations, message, intervalMs } = this.config;

        for (let i = 1; i <= iterations; i++) {
            const line = formatLogEntry(formatTimestamp(this.deps.clock()), i, message);

            const written = await sink.writeLine(line);
            if (!written.ok) {
                this.reportFailure(written.error);
                return { reason: 'io-error', iterationsRun: i - 1, error: written.error };
            }

            this.deps.stdout(line);
            this.notify(cb => cb.onIteration?.(i, line));

            const outcome = await this.deps.sleep(intervalMs, signal);
            if (outcome === 'interrupted') {
                addLog(`[run] Interrupted during pause after iteration ${i}`);
                return { reason: 'interrupted', iterationsRun: i };
            }
        }

        return { reason: 'completed', iterationsRun: Math.max(iterations, 0) };
    }

    private transition(to: RunPhase): void {
        const from = this.phase;
        if (!canTransition(from, to)) {
            throw new Error(`Invalid run transition: ${from} → ${to}`);
        }
        this.phase = to;
        addLog(`[run] ${from} → ${to}`);
        this.notify(cb => cb.onPhaseChange?.(from, to));
    }

    private reportFailure(error: LogSinkError): void {
        addLog(`[run] ${error.describe()}`);
        this.deps.stderr(`Log file error: ${error.describe()}`);
    }

    private notify(call: (callback: RunCallback) => void): void {
        for (const callback of this.callbacks) {
            try {
                call(callback);
            } catch (error) {
                addLog(`[run] Callback failed: ${error instanceof Error ? error.message : String(error)}`);
            }
        }
    }
}
