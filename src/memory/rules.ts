import type { MemoryFact } from "./types.js";

const NAME_LEAD_RE = /\b(?:my name is|call me|i'm called)\s+/i;
// Case-sensitive: only capitalised words extend a name past its first word
const NAME_VALUE_RE = /^[A-Za-z][\w'-]*(?:\s+[A-Z][\w'-]*)*/;
const PREFERENCE_RE = /\b(?:i prefer|i like|my preference is)\s+(.+)/i;
const DISLIKE_RE = /\b(?:i dislike|i hate|i don't like|i do not like)\s+(.+)/i;
const ACTION_RE = /\b(?:when|if) i say\s+["']?(.+?)["']?\s*,?\s*(?:do|run|execute)\s+(.+)/i;
const CORRECTION_RE = /\b(?:actually|update|correction|wait)\b|\bno,/i;

function clean(value: string | undefined): string {
  return (value ?? "").replace(/[.!?\s]+$/, "").trim();
}

function extractName(message: string): string {
  const lead = NAME_LEAD_RE.exec(message);
  if (!lead) return "";
  return clean(NAME_VALUE_RE.exec(message.slice(lead.index + lead[0].length))?.[0]);
}

/** Regex extraction used when no model is available or the model finds nothing. */
export function extractByRules(text: string): MemoryFact[] {
  const message = text.trim();
  if (!message) return [];

  const overwrite = CORRECTION_RE.test(message);
  const facts: MemoryFact[] = [];

  const name = extractName(message);
  if (name) facts.push({ kind: "profile", field: "name", value: name, confidence: 0.9, overwrite });

  const preference = clean(PREFERENCE_RE.exec(message)?.[1]);
  const dislike = clean(DISLIKE_RE.exec(message)?.[1]);
  if (preference) facts.push({ kind: "profile", field: "preference", value: preference, confidence: 0.7, overwrite });
  if (dislike) facts.push({ kind: "profile", field: "dislike", value: dislike, confidence: 0.7, overwrite });

  const action = ACTION_RE.exec(message);
  const trigger = clean(action?.[1]);
  const todo = clean(action?.[2]);
  if (trigger && todo) facts.push({ kind: "action", trigger, action: todo, confidence: 0.7, overwrite });

  return facts;
}
