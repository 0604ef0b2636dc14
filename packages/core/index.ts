export { resolveConfig, DEFAULT_MESSAGE, DEFAULT_ITERATIONS, DEFAULT_LOG_FILE, ITERATION_INTERVAL_MS } from './config.js';
export { formatTimestamp, formatLogEntry } from './format.js';
export { LogSink } from './log-sink.js';
export { LogSinkError } from './errors.js';
export { sleep } from './sleep.js';
export { RunLoop, canTransition, STARTUP_BANNER, FINISHED_LINE } from './run-loop/RunLoop.js';
export type { RunSink, RunLoopDeps } from './run-loop/RunLoop.js';
export type { RunCallback } from './run-loop/RunCallback.js';
export type { RunConfig, RunPhase, RunSummary, StopReason, SinkResult, SleepOutcome } from './types/Run.js';
