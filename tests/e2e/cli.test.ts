import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { runCli, startCli } from '../helpers/run-command';

const LINE_PATTERN = /^\[\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\] Loop (\d+): (.*)$/;

const readLines = (file: string): string[] =>
  fs.readFileSync(file, 'utf-8').split('\n').filter(line => line.length > 0);

describe('ticklog CLI', () => {
  let dir: string;
  let logFile: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ticklog-e2e-'));
    logFile = path.join(dir, 'app.log');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('writes the configured lines to the file and stdout', async () => {
    const { exitCode, stdout, stderr } = await runCli({ LOG_MESSAGE: 'Hello', ITERATIONS: '2', LOG_FILE: logFile });

    expect(exitCode).toBe(0);
    expect(stderr).toBe('');

    const out = stdout.split('\n');
    expect(out).toHaveLength(5);
    expect(out[0]).toBe('Starting Java Application...');
    expect(out[1]).toBe('Will run for 2 iterations.');
    expect(out[4]).toBe('Application finished.');

    const fileLines = readLines(logFile);
    expect(fileLines).toEqual([out[2], out[3]]);
    expect(fileLines.map(line => LINE_PATTERN.exec(line)?.slice(1))).toEqual([
      ['1', 'Hello'],
      ['2', 'Hello'],
    ]);
  });

  test('appends to an existing log file', async () => {
    fs.writeFileSync(logFile, 'earlier run\n');

    const { exitCode } = await runCli({ LOG_MESSAGE: 'again', ITERATIONS: '1', LOG_FILE: logFile });

    expect(exitCode).toBe(0);
    const fileLines = readLines(logFile);
    expect(fileLines).toHaveLength(2);
    expect(fileLines[0]).toBe('earlier run');
    expect(fileLines[1]).toMatch(/^\[.+\] Loop 1: again$/);
  });

  test('ITERATIONS=0 prints only the banner and finished lines', async () => {
    const { exitCode, stdout } = await runCli({ ITERATIONS: '0', LOG_FILE: logFile });

    expect(exitCode).toBe(0);
    expect(stdout).toBe('Starting Java Application...\nWill run for 0 iterations.\nApplication finished.');
    expect(fs.readFileSync(logFile, 'utf-8')).toBe('');
  });

  test('reports an unopenable log file and still exits 0', async () => {
    const missing = path.join(dir, 'missing', 'app.log');

    const { exitCode, stdout, stderr } = await runCli({ ITERATIONS: '3', LOG_FILE: missing });

    expect(exitCode).toBe(0);
    expect(stdout).toBe('Starting Java Application...\nWill run for 3 iterations.\nApplication finished.');
    expect(stderr).toBe(
      `Log file error: Failed to open log file ${missing} (ENOENT: no such file or directory, open '${missing}')`
    );
  });

  test('prints usage for --help without running', async () => {
    const { exitCode, stdout } = await runCli({ LOG_FILE: logFile }, ['--help']);

    expect(exitCode).toBe(0);
    expect(stdout.split('\n')[0]).toBe('Usage: npm start -- [options]');
    expect(fs.existsSync(logFile)).toBe(false);
  });

  const interruptAfterFirstLine = (child: ReturnType<typeof startCli>, signals: NodeJS.Signals[]) =>
    new Promise<void>((resolve, reject) => {
      let seen = '';
      const onData = (chunk: Buffer) => {
        seen += chunk.toString();
        if (seen.includes('Loop 1: tick')) {
          child.stdout?.off('data', onData);
          for (const signal of signals) {
            child.kill(signal);
          }
          resolve();
        }
      };
      child.stdout?.on('data', onData);
      child.once('exit', () => reject(new Error('CLI exited before the first iteration')));
    });

  test('stops early on SIGINT and exits 0', async () => {
    const child = startCli({ LOG_MESSAGE: 'tick', ITERATIONS: '30', LOG_FILE: logFile });

    await interruptAfterFirstLine(child, ['SIGINT']);
    const result = await child;

    expect(result.exitCode).toBe(0);
    expect(result.signal).toBeUndefined();
    expect(result.stdout.split('\n').at(-1)).toBe('Application finished.');
    expect(readLines(logFile)).toHaveLength(1);
  });

  test('absorbs a repeated interrupt during shutdown', async () => {
    const child = startCli({ LOG_MESSAGE: 'tick', ITERATIONS: '30', LOG_FILE: logFile });

    await interruptAfterFirstLine(child, ['SIGINT', 'SIGINT', 'SIGTERM']);
    const result = await child;

    expect(result.exitCode).toBe(0);
    expect(result.signal).toBeUndefined();
    expect(result.stdout.split('\n').at(-1)).toBe('Application finished.');
    expect(readLines(logFile)).toHaveLength(1);
  });
});
