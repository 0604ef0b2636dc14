import minimist from 'minimist';
import { addLog } from '@ticklog/shared/logger';

export interface CliArgs {
  envDir?: string;
  help: boolean;
}

const coerceBoolean = (value: unknown): boolean => {
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'string') {
    return ['1', 'true', 'yes', 'y'].includes(value.trim().toLowerCase());
  }
  return false;
};

const coerceDir = (value: unknown): string | undefined => {
  if (typeof value === 'string' && value.trim().length > 0) {
    return value.trim();
  }
  if (Array.isArray(value)) {
    const first = value.find((entry: unknown) => typeof entry === 'string' && entry.trim().length > 0);
    return typeof first === 'string' ? first.trim() : undefined;
  }
  return undefined;
};

export const parseCliArgs = (argv: string[] = process.argv.slice(2)): CliArgs => {
  // Drop leading "--" separators so minimist will actually parse flags
  let toParse = argv;
  while (toParse.length > 0 && toParse[0] === '--') {
    toParse = toParse.slice(1);
  }

  const parsed = minimist(toParse, {
    string: ['env-dir'],
    boolean: ['help'],
    alias: { h: 'help', e: 'env-dir' },
  });

  const result: CliArgs = {
    envDir: coerceDir(parsed['env-dir']),
    help: coerceBoolean(parsed.help),
  };

  addLog(`[CLI] Parsed args -> envDir: ${result.envDir ?? 'undefined'}, help: ${result.help}`);

  return result;
};
