import { type BenchEvent, type EventWriter } from '../types/events';
import { LedgerError, errorMessage } from '../errors';
import { ensureParentDir } from '../fs/io';
import fs from 'fs';

export class JsonlEventWriter implements EventWriter {
  private readonly stream: fs.WriteStream;
  private closed = false;
  private failure: Error | undefined;

  constructor(private readonly logPath: string) {
    this.stream = fs.createWriteStream(this.logPath, { flags: 'a' });
    // Write failures surface from close().
    this.stream.on('error', (err) => {
      this.failure ??= err;
    });
  }

  /** Creates the trace file up front, so an unwritable path fails before any solver starts. */
  static async open(logPath: string): Promise<JsonlEventWriter> {
    try {
      await ensureParentDir(logPath);
      const handle = await fs.promises.open(logPath, 'a');
      await handle.close();
    } catch (err) {
      throw new LedgerError(`Cannot open trace ${logPath}: ${errorMessage(err)}`, { cause: err });
    }
    return new JsonlEventWriter(logPath);
  }

  write(event: BenchEvent) {
    if (this.closed) {
      console.warn(`Attempted to write to closed trace writer: ${this.logPath}`);
      return;
    }
    if (this.failure) return;
    this.stream.write(JSON.stringify(event) + '\n');
  }

  close(): Promise<void> {
    if (this.closed) return Promise.resolve();
    this.closed = true;
    return new Promise((resolve, reject) => {
      const settle = () => {
        if (this.failure) {
          reject(
            new LedgerError(`Cannot write trace ${this.logPath}: ${this.failure.message}`, {
              cause: this.failure,
            }),
          );
        } else {
          resolve();
        }
      };
      if (this.stream.closed) {
        settle();
        return;
      }
      this.stream.once('close', settle);
      this.stream.end();
    });
  }
}
