import { addLog } from '@ticklog/shared/logger';
import { IterationsSchema, LogFilePathSchema, RunEnvSchema } from './schemas/config.schema.js';
import type { RunConfig } from './types/Run.js';

export const DEFAULT_MESSAGE = 'Default log message';
export const DEFAULT_ITERATIONS = 10;
export const DEFAULT_LOG_FILE = '/app/app.log';
export const ITERATION_INTERVAL_MS = 1000;

const parseIterations = (raw: string | undefined): number => {
  if (raw === undefined) {
    return DEFAULT_ITERATIONS;
  }
  const parsed = IterationsSchema.safeParse(raw);
  if (!parsed.success) {
    addLog(`[config] Ignoring ITERATIONS=${JSON.stringify(raw)}, using ${DEFAULT_ITERATIONS}`);
    return DEFAULT_ITERATIONS;
  }
  return parsed.data;
};

const parseLogFilePath = (raw: string | undefined): string => {
  const parsed = LogFilePathSchema.safeParse(raw);
  return parsed.success ? parsed.data : DEFAULT_LOG_FILE;
};

/**
 * Resolve the run configuration from environment variables.
 *
 * Only an absent LOG_MESSAGE falls back to the default; an empty one is kept.
 * An ITERATIONS value that is not a 32-bit integer is silently replaced by the default.
 */
export const resolveConfig = (env: NodeJS.ProcessEnv = process.env): RunConfig => {
  const parsedEnv = RunEnvSchema.safeParse(env);
  const vars = parsedEnv.success ? parsedEnv.data : {};

  const config: RunConfig = Object.freeze({
    message: vars.LOG_MESSAGE ?? DEFAULT_MESSAGE,
    iterations: parseIterations(vars.ITERATIONS),
    logFilePath: parseLogFilePath(vars.LOG_FILE),
    intervalMs: ITERATION_INTERVAL_MS,
  });

  addLog(
    `[config] message: ${JSON.stringify(config.message)}, iterations: ${config.iterations}, logFile: ${config.logFilePath}`
  );

  return config;
};
