import { z } from "zod";
import { ErrorCodes, systemError } from "../errors/app-error.js";
import { parseJsonObject, type JsonObject } from "../utils/value.js";
import type { ConductorDB } from "./db.js";
import type { DurableStore, ScanOptions, StoredRecord, UpsertOptions } from "./types.js";

const recordRowSchema = z.object({
  collection: z.string(),
  key: z.string(),
  data: z.string(),
  created_at: z.number(),
  updated_at: z.number(),
});

const counterRowSchema = z.object({ field: z.string(), value: z.number() });
const valueRowSchema = z.object({ value: z.number() });

export class SqliteStore implements DurableStore {
  private readonly db;
  private readonly now: () => number;

  constructor(conductorDb: ConductorDB, opts?: { now?: () => number }) {
    this.db = conductorDb.raw();
    this.now = opts?.now ?? Date.now;
  }

  // ── Records ──

  async upsert(collection: string, key: string, data: JsonObject, opts?: UpsertOptions): Promise<boolean> {
    const now = this.now();
    const json = JSON.stringify(data);
    if (opts?.onlyIfAbsent) {
      const info = this.db
        .prepare(
          `INSERT INTO records (collection, key, data, created_at, updated_at)
           VALUES (?, ?, ?, ?, ?)
           ON CONFLICT(collection, key) DO NOTHING`,
        )
        .run(collection, key, json, now, now);
      return info.changes > 0;
    }

    this.db
      .prepare(
        `INSERT INTO records (collection, key, data, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT(collection, key) DO UPDATE SET
           data = excluded.data,
           updated_at = excluded.updated_at`,
      )
      .run(collection, key, json, now, now);
    return true;
  }

  async get(collection: string, key: string): Promise<StoredRecord | null> {
    const row: unknown = this.db
      .prepare("SELECT * FROM records WHERE collection = ? AND key = ?")
      .get(collection, key);
    return row === undefined ? null : this.toRecord(row);
  }

  async scan(collection: string, opts?: ScanOptions): Promise<StoredRecord[]> {
    const limit = opts?.limit ?? -1;
    const rows: unknown[] = opts?.prefix
      ? this.db
          .prepare(
            `SELECT * FROM records
             WHERE collection = ? AND substr(key, 1, length(?)) = ?
             ORDER BY updated_at DESC, rowid DESC LIMIT ?`,
          )
          .all(collection, opts.prefix, opts.prefix, limit)
      : this.db
          .prepare(
            `SELECT * FROM records WHERE collection = ?
             ORDER BY updated_at DESC, rowid DESC LIMIT ?`,
          )
          .all(collection, limit);
    return rows.map((row) => this.toRecord(row));
  }

  // ── Counters ──

  async increment(collection: string, key: string, field: string, by = 1): Promise<number> {
    const row: unknown = this.db
      .prepare(
        `INSERT INTO counters (collection, key, field, value) VALUES (?, ?, ?, ?)
         ON CONFLICT(collection, key, field) DO UPDATE SET value = value + excluded.value
         RETURNING value`,
      )
      .get(collection, key, field, by);
    return valueRowSchema.parse(row).value;
  }

  async counters(collection: string, key: string): Promise<Record<string, number>> {
    const rows: unknown[] = this.db
      .prepare("SELECT field, value FROM counters WHERE collection = ? AND key = ?")
      .all(collection, key);
    const out: Record<string, number> = {};
    for (const row of rows) {
      const { field, value } = counterRowSchema.parse(row);
      out[field] = value;
    }
    return out;
  }

  close(): void {
    if (this.db.open) this.db.close();
  }

  private toRecord(row: unknown): StoredRecord {
    const parsed = recordRowSchema.parse(row);
    const data = parseJsonObject(parsed.data);
    if (!data) {
      throw systemError(ErrorCodes.STORE_CORRUPT, `Stored record ${parsed.collection}/${parsed.key} is not a JSON object`);
    }
    return {
      collection: parsed.collection,
      key: parsed.key,
      data,
      createdAt: parsed.created_at,
      updatedAt: parsed.updated_at,
    };
  }
}
