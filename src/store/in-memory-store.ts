import type { JsonObject } from "../utils/value.js";
import type { DurableStore, ScanOptions, StoredRecord, UpsertOptions } from "./types.js";

interface Entry {
  record: StoredRecord;
  seq: number;
}

/** Process-local store for tests and ephemeral runs. */
export class InMemoryStore implements DurableStore {
  private readonly records = new Map<string, Map<string, Entry>>();
  private readonly counterValues = new Map<string, Map<string, number>>();
  private readonly now: () => number;
  private seq = 0;

  constructor(opts?: { now?: () => number }) {
    this.now = opts?.now ?? Date.now;
  }

  async upsert(collection: string, key: string, data: JsonObject, opts?: UpsertOptions): Promise<boolean> {
    const bucket = this.bucket(collection);
    const existing = bucket.get(key);
    if (existing && opts?.onlyIfAbsent) return false;

    const now = this.now();
    bucket.set(key, {
      record: {
        collection,
        key,
        data: structuredClone(data),
        createdAt: existing?.record.createdAt ?? now,
        updatedAt: now,
      },
      seq: existing?.seq ?? this.seq++,
    });
    return true;
  }

  async get(collection: string, key: string): Promise<StoredRecord | null> {
    const entry = this.records.get(collection)?.get(key);
    return entry ? cloneRecord(entry.record) : null;
  }

  async scan(collection: string, opts?: ScanOptions): Promise<StoredRecord[]> {
    const bucket = this.records.get(collection);
    if (!bucket) return [];
    const prefix = opts?.prefix ?? "";
    const entries = [...bucket.values()]
      .filter((e) => e.record.key.startsWith(prefix))
      .sort((a, b) => b.record.updatedAt - a.record.updatedAt || b.seq - a.seq);
    const limited = opts?.limit !== undefined && opts.limit >= 0 ? entries.slice(0, opts.limit) : entries;
    return limited.map((e) => cloneRecord(e.record));
  }

  async increment(collection: string, key: string, field: string, by = 1): Promise<number> {
    const id = `${collection}\u0000${key}`;
    let fields = this.counterValues.get(id);
    if (!fields) {
      fields = new Map();
      this.counterValues.set(id, fields);
    }
    const next = (fields.get(field) ?? 0) + by;
    fields.set(field, next);
    return next;
  }

  async counters(collection: string, key: string): Promise<Record<string, number>> {
    const fields = this.counterValues.get(`${collection}\u0000${key}`);
    return fields ? Object.fromEntries(fields) : {};
  }

  close(): void {
    this.records.clear();
    this.counterValues.clear();
  }

  private bucket(collection: string): Map<string, Entry> {
    let bucket = this.records.get(collection);
    if (!bucket) {
      bucket = new Map();
      this.records.set(collection, bucket);
    }
    return bucket;
  }
}

function cloneRecord(record: StoredRecord): StoredRecord {
  return { ...record, data: structuredClone(record.data) };
}
