import { join } from 'node:path';
import dotenv from 'dotenv';
import { addLog } from './logger.js';

const ENV_FILE_NAME = '.env.local';

/**
 * Load `.env.local` from the working directory. Variables already present in
 * the process environment always win.
 */
export const loadEnv = (workingDir: string = process.cwd()) => {
  const envPath = join(workingDir, ENV_FILE_NAME);
  const result = dotenv.config({
    path: envPath,
    override: false,
    debug: false,
  });

  if (result.error) {
    addLog(`[env] No ${ENV_FILE_NAME} loaded from ${workingDir}`);
    return;
  }

  const keys = Object.keys(result.parsed ?? {});
  addLog(`[env] Loaded ${ENV_FILE_NAME} (${keys.length} keys): ${keys.join(', ')}`);
};
