import { readFileSync } from "node:fs";
import { ZodError } from "zod";
import { ErrorCodes, userError } from "../errors/app-error.js";
import type { ConductorConfig } from "./types.js";
import { resolveConfigPath } from "./paths.js";
import { parseConfig } from "./schema.js";

const ENV_PATTERN = /\$\{env:([A-Z_][A-Z0-9_]*)\}/g;

export interface ConfigSource {
  readonly path: string;
  /** Null when the file does not exist. */
  readonly content: string | null;
}

export function substituteEnv(raw: string): string {
  return raw.replace(ENV_PATTERN, (match, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      throw userError(
        ErrorCodes.CONFIG_INVALID,
        `Missing environment variable: ${varName} (referenced as ${match})`,
      );
    }
    return value;
  });
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export function readConfigSource(path?: string): ConfigSource {
  const configPath = resolveConfigPath(path);
  try {
    return { path: configPath, content: readFileSync(configPath, "utf-8") };
  } catch (err) {
    if (isMissingFile(err)) return { path: configPath, content: null };
    throw err;
  }
}

/** Substitutes `${env:NAME}` references, then parses and validates the JSON. */
export function parseConfigText(content: string, path: string): ConductorConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(substituteEnv(content));
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw userError(ErrorCodes.CONFIG_INVALID, `Config file is not valid JSON: ${path}`, { cause: err });
    }
    throw err;
  }
  try {
    return parseConfig(raw);
  } catch (err) {
    if (!(err instanceof ZodError)) throw err;
    const issues = err.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw userError(ErrorCodes.CONFIG_INVALID, `Invalid config in ${path}: ${issues}`, { cause: err });
  }
}

/** A missing file yields the defaults. */
export function loadConfig(path?: string): ConductorConfig {
  const source = readConfigSource(path);
  return source.content === null ? parseConfig({}) : parseConfigText(source.content, source.path);
}
