/**
 * Tagged value passed across capability and model boundaries.
 * Keeps provider inputs schema-less without leaking `unknown` into the core.
 */
export type Value =
  | { readonly kind: "string"; readonly value: string }
  | { readonly kind: "number"; readonly value: number }
  | { readonly kind: "bool"; readonly value: boolean }
  | { readonly kind: "list"; readonly items: readonly Value[] }
  | { readonly kind: "map"; readonly entries: ValueMap }
  | { readonly kind: "null" };

export type ValueMap = Readonly<Record<string, Value>>;

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export const NULL: Value = { kind: "null" };

export function str(value: string): Value {
  return { kind: "string", value };
}

export function num(value: number): Value {
  return { kind: "number", value };
}

export function bool(value: boolean): Value {
  return { kind: "bool", value };
}

export function list(items: readonly Value[]): Value {
  return { kind: "list", items };
}

export function map(entries: ValueMap): Value {
  return { kind: "map", entries };
}

function isRecord(raw: unknown): raw is Record<string, unknown> {
  return typeof raw === "object" && raw !== null && !Array.isArray(raw);
}

export function isJsonValue(raw: unknown): raw is JsonValue {
  if (raw === null) return true;
  switch (typeof raw) {
    case "string":
    case "boolean":
      return true;
    case "number":
      return Number.isFinite(raw);
    case "object":
      if (Array.isArray(raw)) return raw.every(isJsonValue);
      return isJsonObject(raw);
    default:
      return false;
  }
}

export function isJsonObject(raw: unknown): raw is JsonObject {
  return isRecord(raw) && Object.values(raw).every(isJsonValue);
}

/** Parses text that must hold a JSON object; anything else yields null. */
export function parseJsonObject(text: string): JsonObject | null {
  try {
    const parsed: unknown = JSON.parse(text);
    return isJsonObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/** Converts parsed JSON (or any plain data) into a Value. Functions and symbols become null. */
export function fromJson(raw: unknown): Value {
  if (raw === null || raw === undefined) return NULL;
  if (typeof raw === "string") return str(raw);
  if (typeof raw === "number") return Number.isFinite(raw) ? num(raw) : NULL;
  if (typeof raw === "boolean") return bool(raw);
  if (Array.isArray(raw)) return list(raw.map(fromJson));
  if (isRecord(raw)) return map(mapFromJson(raw));
  return NULL;
}

export function mapFromJson(raw: unknown): ValueMap {
  if (!isRecord(raw)) return {};
  const out: Record<string, Value> = {};
  for (const [key, val] of Object.entries(raw)) {
    if (val === undefined) continue;
    out[key] = fromJson(val);
  }
  return out;
}

export function toJson(value: Value): JsonValue {
  switch (value.kind) {
    case "string":
    case "number":
    case "bool":
      return value.value;
    case "null":
      return null;
    case "list":
      return value.items.map(toJson);
    case "map":
      return mapToJson(value.entries);
  }
}

export function mapToJson(entries: ValueMap): JsonObject {
  const out: JsonObject = {};
  for (const [key, val] of Object.entries(entries)) {
    out[key] = toJson(val);
  }
  return out;
}

export function mapFromStrings(record: Readonly<Record<string, string>>): ValueMap {
  const out: Record<string, Value> = {};
  for (const [key, val] of Object.entries(record)) {
    out[key] = str(val);
  }
  return out;
}

// ── Accessors ──

export function asString(value: Value | undefined): string | undefined {
  if (!value) return undefined;
  if (value.kind === "string") return value.value;
  if (value.kind === "number" || value.kind === "bool") return String(value.value);
  return undefined;
}

export function asNumber(value: Value | undefined): number | undefined {
  if (!value) return undefined;
  if (value.kind === "number") return value.value;
  if (value.kind === "string" && value.value.trim() !== "") {
    const parsed = Number(value.value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

export function asBool(value: Value | undefined): boolean | undefined {
  if (!value) return undefined;
  if (value.kind === "bool") return value.value;
  if (value.kind === "string") {
    const lower = value.value.toLowerCase();
    if (lower === "true") return true;
    if (lower === "false") return false;
  }
  return undefined;
}

/** Human-readable rendering used in prompts and CLI output. */
export function render(value: Value): string {
  switch (value.kind) {
    case "string":
      return value.value;
    case "number":
    case "bool":
      return String(value.value);
    case "null":
      return "";
    case "list":
    case "map":
      return JSON.stringify(toJson(value));
  }
}
