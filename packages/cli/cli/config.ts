import { loadEnv } from '@ticklog/shared/env';
import { resolveConfig, type RunConfig } from '@ticklog/core';
import { parseCliArgs } from './args.js';

export type CliConfig =
  | { kind: 'help' }
  | { kind: 'run'; run: RunConfig };

/**
 * Parse argv, load `.env.local` and resolve the run configuration.
 */
export const loadCliConfig = (
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): CliConfig => {
  const cliArgs = parseCliArgs(argv);

  if (cliArgs.help) {
    return { kind: 'help' };
  }

  loadEnv(cliArgs.envDir ?? process.cwd());

  return { kind: 'run', run: resolveConfig(env) };
};
