/**
 * Append-only JSON-lines file sink
 * The file handle is opened lazily on the first write and released on close.
 */

import fs from 'fs';
import path from 'path';
import logger from '../shared/logger';
import { SinkError, describeError } from '../shared/errors';
import { DispatchRecord, encodeRecord } from '../canonicalizer/canonical-event';
import { Sink } from './sink';

export class FileSink implements Sink {
  public readonly name: string;
  private handle: fs.promises.FileHandle | null = null;
  private opening: Promise<fs.promises.FileHandle> | null = null;

  constructor(private readonly filePath: string) {
    this.name = `file:${path.basename(filePath)}`;
  }

  async write(record: DispatchRecord): Promise<void> {
    try {
      const handle = await this.open();
      await handle.appendFile(`${encodeRecord(record)}\n`, 'utf8');
    } catch (error) {
      throw new SinkError(this.name, `append to ${this.filePath} failed: ${describeError(error)}`, { cause: error });
    }
  }

  async close(): Promise<void> {
    const handle = this.handle ?? (this.opening ? await this.opening : null);
    this.handle = null;
    this.opening = null;
    if (handle) {
      await handle.close();
      logger.info(`[FileSink] Closed ${this.filePath}`);
    }
  }

  private async open(): Promise<fs.promises.FileHandle> {
    if (this.handle) return this.handle;
    if (!this.opening) {
      this.opening = (async () => {
        await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
        return fs.promises.open(this.filePath, 'a');
      })();
    }
    try {
      this.handle = await this.opening;
      return this.handle;
    } finally {
      this.opening = null;
    }
  }
}
