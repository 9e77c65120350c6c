// JSON lines on stdout (logs go to stderr)

import { Writable } from 'stream';
import { SinkError } from '../shared/errors';
import { DispatchRecord, encodeRecord } from '../canonicalizer/canonical-event';
import { Sink } from './sink';

export class StdoutSink implements Sink {
  public readonly name = 'stdout';

  constructor(private readonly output: Writable = process.stdout) {}

  write(record: DispatchRecord): Promise<void> {
    const line = `${encodeRecord(record)}\n`;
    return new Promise<void>((resolve, reject) => {
      this.output.write(line, (error) => {
        if (error) reject(new SinkError(this.name, error.message, { cause: error }));
        else resolve();
      });
    });
  }

  async close(): Promise<void> {}
}
