import { StoreUnavailableError, type ReadingStore } from "@sensorcast/core";
import type { Adapter, DeviceReading, NewReading } from "../types";
import { openDb, type DB } from "./db";
import type { Statement } from "better-sqlite3";

type Row = {
  id: number;
  device_id: string;
  recorded_at: string;
  carbon_monoxide_ppm: number;
  temperature_celcius: number;
  pm1_ug_m3: number;
  pm2_5_ug_m3: number;
  pm4_ug_m3: number;
  pm10_ug_m3: number;
};

type InsertParams = Omit<Row, "id">;

type PageParams = {
  device: string | null;
  beforeAt: string | null;
  beforeId: number | null;
  limit: number;
};

/** Keyset position in `(recorded_at DESC, id DESC)` order. */
export type PageCursor = { recordedAt: string; id: number };

export type PageQuery = {
  deviceId?: string;
  /** Exclusive: only readings strictly older than this position. */
  before?: PageCursor;
  limit: number;
};

export type Page = { readings: DeviceReading[]; next: PageCursor | null };

const COLUMNS = `id, device_id, recorded_at, carbon_monoxide_ppm, temperature_celcius,
  pm1_ug_m3, pm2_5_ug_m3, pm4_ug_m3, pm10_ug_m3`;

/**
 * Readings table on better-sqlite3. Timestamps are stored as `toISOString()` text,
 * so lexical order is time order; ties fall back to insertion id.
 */
export class SqliteReadingStore implements ReadingStore<DeviceReading>, Adapter {
  public readonly name = "sqlite";
  private readonly db: DB;
  private readonly insertRow: Statement<[InsertParams]>;
  private readonly latestRow: Statement<[string], Row>;
  private readonly recentRows: Statement<[string, number], Row>;
  private readonly pageRows: Statement<[PageParams], Row>;
  private readonly maxIdRow: Statement<[], { max: number }>;
  private readonly sinceRows: Statement<[number, number], { id: number; device_id: string }>;

  constructor(dbOrPath: DB | string) {
    this.db = openDb(dbOrPath);
    this.insertRow = this.db.prepare<[InsertParams]>(
      `INSERT INTO device_data (device_id, recorded_at, carbon_monoxide_ppm, temperature_celcius,
         pm1_ug_m3, pm2_5_ug_m3, pm4_ug_m3, pm10_ug_m3)
       VALUES (@device_id, @recorded_at, @carbon_monoxide_ppm, @temperature_celcius,
         @pm1_ug_m3, @pm2_5_ug_m3, @pm4_ug_m3, @pm10_ug_m3)`,
    );
    this.latestRow = this.db.prepare<[string], Row>(
      `SELECT ${COLUMNS} FROM device_data WHERE device_id = ?
       ORDER BY recorded_at DESC, id DESC LIMIT 1`,
    );
    this.recentRows = this.db.prepare<[string, number], Row>(
      `SELECT ${COLUMNS} FROM device_data WHERE device_id = ?
       ORDER BY recorded_at DESC, id DESC LIMIT ?`,
    );
    this.pageRows = this.db.prepare<[PageParams], Row>(
      `SELECT ${COLUMNS} FROM device_data
       WHERE (@device IS NULL OR device_id = @device)
         AND (@beforeAt IS NULL OR recorded_at < @beforeAt OR (recorded_at = @beforeAt AND id < @beforeId))
       ORDER BY recorded_at DESC, id DESC LIMIT @limit`,
    );
    this.maxIdRow = this.db.prepare<[], { max: number }>(`SELECT IFNULL(MAX(id), 0) AS max FROM device_data`);
    this.sinceRows = this.db.prepare<[number, number], { id: number; device_id: string }>(
      `SELECT id, device_id FROM device_data WHERE id > ? ORDER BY id LIMIT ?`,
    );
  }

  /** Write path. Throws on constraint or I/O failure; nothing is notified then. */
  insert(input: NewReading): DeviceReading {
    const recordedAt = normalizeTimestamp(input.recordedAt);
    const params: InsertParams = {
      device_id: input.deviceId,
      recorded_at: recordedAt,
      carbon_monoxide_ppm: input.carbonMonoxidePpm,
      temperature_celcius: input.temperatureCelsius,
      pm1_ug_m3: input.pm1,
      pm2_5_ug_m3: input.pm2_5,
      pm4_ug_m3: input.pm4,
      pm10_ug_m3: input.pm10,
    };
    const res = this.insertRow.run(params);
    return fromRow({ id: Number(res.lastInsertRowid), ...params });
  }

  async latest(deviceId: string): Promise<DeviceReading | null> {
    const row = this.query(`latest(${deviceId})`, () => this.latestRow.get(deviceId));
    return row ? fromRow(row) : null;
  }

  async recent(deviceId: string, limit: number): Promise<DeviceReading[]> {
    return this.query(`recent(${deviceId})`, () => this.recentRows.all(deviceId, limit)).map(fromRow);
  }

  /** History page, newest first, across all devices or one. */
  page(q: PageQuery): Page {
    const rows = this.pageRows.all({
      device: q.deviceId ?? null,
      beforeAt: q.before?.recordedAt ?? null,
      beforeId: q.before?.id ?? null,
      limit: q.limit,
    });
    const readings = rows.map(fromRow);
    const last = readings[readings.length - 1];
    const next = last && readings.length === q.limit ? { recordedAt: last.recordedAt, id: last.id } : null;
    return { readings, next };
  }

  maxId(): number {
    return this.maxIdRow.get()?.max ?? 0;
  }

  /** Rows committed after `afterId`, in commit order. */
  sinceId(afterId: number, limit: number): Array<{ id: number; deviceId: string }> {
    return this.sinceRows.all(afterId, limit).map(r => ({ id: r.id, deviceId: r.device_id }));
  }

  async health(): Promise<{ ok: boolean; detail?: string }> {
    try {
      this.maxId();
      return { ok: true };
    } catch (err) {
      return { ok: false, detail: String(err) };
    }
  }

  async drain(): Promise<void> {
    if (this.db.open) this.db.close();
  }

  private query<T>(what: string, run: () => T): T {
    try {
      return run();
    } catch (err) {
      throw new StoreUnavailableError(`${what} failed`, { cause: err });
    }
  }
}

export function normalizeTimestamp(value: string | Date): string {
  const d = value instanceof Date ? value : new Date(value);
  if (Number.isNaN(d.getTime())) throw new RangeError(`invalid timestamp: ${String(value)}`);
  return d.toISOString();
}

function fromRow(row: Row): DeviceReading {
  return {
    id: row.id,
    deviceId: row.device_id,
    recordedAt: row.recorded_at,
    carbonMonoxidePpm: row.carbon_monoxide_ppm,
    temperatureCelsius: row.temperature_celcius,
    pm1: row.pm1_ug_m3,
    pm2_5: row.pm2_5_ug_m3,
    pm4: row.pm4_ug_m3,
    pm10: row.pm10_ug_m3,
  };
}
