import { mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, extname, join, resolve } from "node:path";

export const DEFAULT_CONFIG_FILE = "conductor.config.json";
export const DB_FILE_NAME = "conductor.db";
export const IN_MEMORY_DB = ":memory:";

/** `CONDUCTOR_STATE_DIR`, else `~/.conductor`. */
export function getStateDir(): string {
  return process.env["CONDUCTOR_STATE_DIR"] ?? join(homedir(), ".conductor");
}

/** The explicit path, else `CONDUCTOR_CONFIG_PATH`, else the default file in the working directory. */
export function resolveConfigPath(explicit?: string): string {
  return resolve(explicit ?? process.env["CONDUCTOR_CONFIG_PATH"] ?? DEFAULT_CONFIG_FILE);
}

/**
 * Database file for a `storage.path` setting. `:memory:` is kept as is, a
 * path ending in `.db` names the file, and any other path names the
 * directory that holds `conductor.db`. Unset means the state directory.
 * The containing directory is created.
 */
export function resolveDatabasePath(configured?: string): string {
  if (configured === IN_MEMORY_DB) return IN_MEMORY_DB;
  const location = resolve(configured ?? getStateDir());
  if (extname(location) === ".db") {
    mkdirSync(dirname(location), { recursive: true });
    return location;
  }
  mkdirSync(location, { recursive: true });
  return join(location, DB_FILE_NAME);
}
