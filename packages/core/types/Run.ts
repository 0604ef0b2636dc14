/**
 * Run Types
 *
 * Shared shapes for the timed logging run: resolved configuration,
 * lifecycle phases and the outcome reported when a run ends.
 */

import type { LogSinkError } from '../errors.js';

export interface RunConfig {
    readonly message: string;
    readonly iterations: number;
    readonly logFilePath: string;
    readonly intervalMs: number;
}

export type RunPhase = 'STARTING' | 'RUNNING' | 'STOPPING' | 'DONE';

export type StopReason = 'completed' | 'interrupted' | 'io-error';

export interface RunSummary {
    reason: StopReason;
    iterationsRun: number;
    logFilePath: string;
    error?: LogSinkError;
}

export type SinkResult<T> =
    | { ok: true; value: T }
    | { ok: false; error: LogSinkError };

export type SleepOutcome = 'elapsed' | 'interrupted';
