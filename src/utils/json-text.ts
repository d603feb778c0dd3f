const FENCE = /```(?:json)?\s*([\s\S]*?)```/i;

/**
 * Pulls the JSON payload out of model output: a fenced block if present,
 * otherwise the outermost object or array in the text.
 */
export function extractJsonText(text: string): string | null {
  const fenced = FENCE.exec(text);
  const body = (fenced?.[1] ?? text).trim();
  if (body.startsWith("{") || body.startsWith("[")) return body;

  const start = body.search(/[[{]/);
  if (start < 0) return null;
  const open = body[start];
  const close = open === "{" ? "}" : "]";
  const end = body.lastIndexOf(close);
  return end > start ? body.slice(start, end + 1) : null;
}

/** Parses JSON embedded in model output; returns undefined when there is none. */
export function parseModelJson(text: string): unknown {
  const payload = extractJsonText(text);
  if (payload === null) return undefined;
  try {
    const parsed: unknown = JSON.parse(payload);
    return parsed;
  } catch {
    return undefined;
  }
}
