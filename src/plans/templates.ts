import { list, map, str, type Value, type ValueMap } from "../utils/value.js";
import type { Plan, PlanStep } from "./types.js";

export interface Instantiation {
  readonly steps: readonly PlanStep[];
  readonly variables: Readonly<Record<string, string>>;
  /** Required variables with no value and no default. Non-empty means the plan must not run. */
  readonly missing: readonly string[];
}

const PLACEHOLDER = /\{\{\s*([A-Za-z_][\w-]*)\s*\}\}/g;

function placeholders(value: Value, into: Set<string>): void {
  switch (value.kind) {
    case "string":
      for (const match of value.value.matchAll(PLACEHOLDER)) {
        if (match[1]) into.add(match[1]);
      }
      return;
    case "list":
      for (const item of value.items) placeholders(item, into);
      return;
    case "map":
      for (const item of Object.values(value.entries)) placeholders(item, into);
      return;
    default:
      return;
  }
}

function bindString(text: string, vars: Readonly<Record<string, string>>): string {
  return text.replace(PLACEHOLDER, (whole, name: string) => vars[name] ?? whole);
}

function bindValue(value: Value, vars: Readonly<Record<string, string>>): Value {
  switch (value.kind) {
    case "string":
      return str(bindString(value.value, vars));
    case "list":
      return list(value.items.map((item) => bindValue(item, vars)));
    case "map":
      return map(bindMap(value.entries, vars));
    default:
      return value;
  }
}

function bindMap(entries: ValueMap, vars: Readonly<Record<string, string>>): ValueMap {
  const out: Record<string, Value> = {};
  for (const [key, value] of Object.entries(entries)) out[key] = bindValue(value, vars);
  return out;
}

/**
 * Binds `{{name}}` placeholders from intent variables, falling back to the
 * plan's declared defaults. `{{step.N}}` references are left for the executor.
 * A placeholder the plan never declared is treated as required.
 */
export function instantiate(plan: Plan, vars: Readonly<Record<string, string>>): Instantiation {
  const bound: Record<string, string> = {};
  const missing = new Set<string>();

  for (const variable of plan.variables) {
    const value = vars[variable.name] ?? variable.default;
    if (value !== undefined) {
      bound[variable.name] = value;
    } else if (variable.required) {
      missing.add(variable.name);
    }
  }

  const referenced = new Set<string>();
  for (const step of plan.steps) {
    for (const value of Object.values(step.input)) placeholders(value, referenced);
  }
  for (const name of referenced) {
    if (name in bound) continue;
    const value = vars[name];
    if (value !== undefined) bound[name] = value;
    else missing.add(name);
  }

  if (missing.size > 0) return { steps: plan.steps, variables: bound, missing: [...missing] };

  return {
    steps: plan.steps.map((step) => ({ ...step, input: bindMap(step.input, bound) })),
    variables: bound,
    missing: [],
  };
}
