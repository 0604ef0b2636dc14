import fs from 'fs';
import { once } from 'node:events';
import { addLog } from '@ticklog/shared/logger';
import { LogSinkError } from './errors.js';
import type { SinkResult } from './types/Run.js';

const OK: SinkResult<void> = { ok: true, value: undefined };

/**
 * LogSink - append-only file target for run log lines.
 *
 * Every line is handed to the file before writeLine resolves, so a reader
 * tailing the file sees it before the next iteration starts. The file is
 * created when missing and never truncated.
 */
export class LogSink {
  readonly filePath: string;
  private stream: fs.WriteStream;
  private closed = false;

  private constructor(filePath: string, stream: fs.WriteStream) {
    this.filePath = filePath;
    this.stream = stream;

    // Write failures are reported through the write callback
    this.stream.on('error', error => {
      addLog(`[sink] Stream error on ${filePath}: ${error.message}`);
    });
  }

  /**
   * Open `filePath` in append mode. Parent directories are not created.
   */
  static async open(filePath: string): Promise<SinkResult<LogSink>> {
    const stream = fs.createWriteStream(filePath, { flags: 'a', encoding: 'utf-8' });
    try {
      await once(stream, 'open');
    } catch (error) {
      stream.destroy();
      return {
        ok: false,
        error: new LogSinkError(`Failed to open log file ${filePath}`, filePath, error),
      };
    }
    addLog(`[sink] Opened ${filePath}`);
    return { ok: true, value: new LogSink(filePath, stream) };
  }

  get isClosed(): boolean {
    return this.closed;
  }

  writeLine(line: string): Promise<SinkResult<void>> {
    if (this.closed || this.stream.destroyed) {
      return Promise.resolve({
        ok: false,
        error: new LogSinkError(`Log file ${this.filePath} is closed`, this.filePath),
      });
    }

    return new Promise(resolve => {
      this.stream.write(`${line}\n`, error => {
        if (error) {
          resolve({
            ok: false,
            error: new LogSinkError(`Failed to write to log file ${this.filePath}`, this.filePath, error),
          });
          return;
        }
        resolve(OK);
      });
    });
  }

  /**
   * Release the file handle. Only the first call closes; later calls are no-ops.
   */
  close(): Promise<SinkResult<void>> {
    if (this.closed) {
      return Promise.resolve(OK);
    }
    this.closed = true;

    if (this.stream.destroyed) {
      addLog(`[sink] ${this.filePath} already destroyed`);
      return Promise.resolve(OK);
    }

    return new Promise(resolve => {
      this.stream.end((error?: Error | null) => {
        if (error) {
          resolve({
            ok: false,
            error: new LogSinkError(`Failed to close log file ${this.filePath}`, this.filePath, error),
          });
          return;
        }
        addLog(`[sink] Closed ${this.filePath}`);
        resolve(OK);
      });
    });
  }
}
