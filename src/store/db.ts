import Database from "better-sqlite3";
import { ErrorCodes, systemError } from "../errors/app-error.js";

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS records (
  collection  TEXT NOT NULL,
  key         TEXT NOT NULL,
  data        TEXT NOT NULL,
  created_at  INTEGER NOT NULL,
  updated_at  INTEGER NOT NULL,
  PRIMARY KEY (collection, key)
);

CREATE INDEX IF NOT EXISTS idx_records_updated
  ON records(collection, updated_at DESC);

CREATE TABLE IF NOT EXISTS counters (
  collection  TEXT NOT NULL,
  key         TEXT NOT NULL,
  field       TEXT NOT NULL,
  value       REAL NOT NULL DEFAULT 0,
  PRIMARY KEY (collection, key, field)
);
`;

/** Bumped whenever SCHEMA_SQL changes shape. */
export const SCHEMA_VERSION = 1;

export class ConductorDB {
  private db: Database.Database;

  /** `file` is a database path or `:memory:`; see `resolveDatabasePath`. */
  constructor(file: string) {
    this.db = new Database(file);
    this.db.pragma("journal_mode = WAL");

    const version = this.db.pragma("user_version", { simple: true });
    if (typeof version === "number" && version > SCHEMA_VERSION) {
      this.db.close();
      throw systemError(
        ErrorCodes.STORE_VERSION_UNSUPPORTED,
        `Database schema version ${version} is newer than supported version ${SCHEMA_VERSION}`,
        { context: { file } },
      );
    }
    this.db.exec(SCHEMA_SQL);
    this.db.pragma(`user_version = ${SCHEMA_VERSION}`);
  }

  schemaVersion(): number {
    const version = this.db.pragma("user_version", { simple: true });
    return typeof version === "number" ? version : 0;
  }

  raw(): Database.Database {
    return this.db;
  }

  isOpen(): boolean {
    return this.db.open;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
