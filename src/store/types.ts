import type { JsonObject } from "../utils/value.js";

export interface StoredRecord {
  readonly collection: string;
  readonly key: string;
  readonly data: JsonObject;
  readonly createdAt: number;
  readonly updatedAt: number;
}

export interface UpsertOptions {
  /** Insert only when the key is new. The first write wins. */
  readonly onlyIfAbsent?: boolean;
}

export interface ScanOptions {
  readonly prefix?: string;
  readonly limit?: number;
}

/**
 * Keyed document storage with atomic counters. Everything the core persists
 * goes through this contract; the physical schema stays behind it.
 */
export interface DurableStore {
  /** Returns whether the record was written. */
  upsert(collection: string, key: string, data: JsonObject, opts?: UpsertOptions): Promise<boolean>;
  get(collection: string, key: string): Promise<StoredRecord | null>;
  /** Newest `updatedAt` first. */
  scan(collection: string, opts?: ScanOptions): Promise<StoredRecord[]>;
  increment(collection: string, key: string, field: string, by?: number): Promise<number>;
  counters(collection: string, key: string): Promise<Record<string, number>>;
  close(): void;
}
