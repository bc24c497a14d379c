import { sleep, type ChangeFeed, type DeviceId } from "@sensorcast/core";

/** The slice of the store the feed reads. */
export interface CommitLog {
  maxId(): number;
  sinceId(afterId: number, limit: number): Array<{ id: number; deviceId: string }>;
}

export type SqliteChangeFeedOptions = {
  pollIntervalMs?: number;
  batchSize?: number;
};

/**
 * SQLite has no LISTEN/NOTIFY, so commits are found by tailing the
 * AUTOINCREMENT id. The first `open` starts at the current head; later opens
 * resume where the previous one stopped, so a restart loses nothing.
 */
export class SqliteChangeFeed implements ChangeFeed {
  private cursor: number | null = null;
  private readonly pollIntervalMs: number;
  private readonly batchSize: number;

  constructor(private readonly log: CommitLog, opts: SqliteChangeFeedOptions = {}) {
    this.pollIntervalMs = opts.pollIntervalMs ?? 100;
    this.batchSize = opts.batchSize ?? 500;
  }

  get position(): number | null {
    return this.cursor;
  }

  open(signal: AbortSignal): AsyncIterable<DeviceId> {
    return this.tail(signal);
  }

  private async *tail(signal: AbortSignal): AsyncGenerator<DeviceId> {
    if (this.cursor === null) this.cursor = this.log.maxId();
    while (!signal.aborted) {
      const rows = this.log.sinceId(this.cursor, this.batchSize);
      for (const row of rows) {
        this.cursor = row.id;
        yield row.deviceId;
        if (signal.aborted) return;
      }
      if (rows.length < this.batchSize) await sleep(this.pollIntervalMs, signal);
    }
  }
}
