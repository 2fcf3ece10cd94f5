import { mkdir, open, type FileHandle } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { EventRecord } from './types.js';

/**
 * Destination for event records
 */
export interface EventSink {
  append(record: EventRecord): Promise<void>;
}

/**
 * Append-only NDJSON writer for event records.
 *
 * Opened once per provider run. Every record is synced to disk before
 * `append` resolves, so an interrupted run leaves a truthful partial log.
 */
export class EventLog implements EventSink {
  private handle: FileHandle | null = null;

  constructor(readonly path: string) {}

  async open(options: { truncate?: boolean } = {}): Promise<void> {
    if (this.handle) return;
    await mkdir(dirname(this.path), { recursive: true });
    this.handle = await open(this.path, options.truncate ? 'w' : 'a');
  }

  async append(record: EventRecord): Promise<void> {
    if (!this.handle) {
      throw new Error(`Event log not open: ${this.path}`);
    }
    await this.handle.appendFile(`${JSON.stringify(record)}\n`, 'utf8');
    await this.handle.sync();
  }

  async close(): Promise<void> {
    if (this.handle) {
      const handle = this.handle;
      this.handle = null;
      await handle.close();
    }
  }
}
