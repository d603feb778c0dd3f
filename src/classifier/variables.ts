export type Variables = Record<string, string>;

const URL_RE = /https?:\/\/[^\s"'<>]+/gi;
const EDGE_PUNCT = /^[\s"'`([{<]+|[\s"'`)\]}>,;:!?]+$/g;
const FILE_LIKE = /^[\w\-./~]*[\w-]\.[a-z][a-z0-9]{0,9}$/i;
const DOUBLE_QUOTED = /["“`]([^"”`]+)["”`]/;
const SINGLE_QUOTED = /(?:^|\s)'([^']+)'(?=$|[\s.,!?;:])/;
const DIR_RE = /\b(?:in|from|under|inside|within)\s+(?:the\s+)?(?:directory\s+|folder\s+|dir\s+)?["'`]?([\w\-./~]+)/i;
const FUNCTION_RE = /\b(?:function|method|class|func)\s+["'`]?([A-Za-z_$][\w$]*)/i;
const TASK_ID_RE = /\b(?:task|todo)\s*#?(\d+)\b/i;
const CLOCK_RE = /(?:\bat|@)\s*(\d{1,2}(?::\d{2})?\s*(?:am|pm))\b/i;
const RELATIVE_TIME_RE = /\b(today|tonight|tomorrow|next week|this week|this weekend)\b/i;
const NOT_A_DIR = new Set(["the", "a", "an", "my", "this", "that", "it", "here", "there", "all", "file", "files"]);
const NOT_AN_EXTENSION = new Set([
  "all", "the", "my", "some", "these", "those", "any", "new", "of", "which", "what", "config",
  "list", "show", "find", "search", "grep", "read", "open", "delete", "remove", "view", "many",
]);

function cleanToken(token: string): string {
  // A trailing sentence period is not part of a path
  return token.replace(EDGE_PUNCT, "").replace(/\.$/, "");
}

function stripUrls(text: string): string {
  return text.replace(URL_RE, " ");
}

// ── Individual extractors ──

/** The last token that looks like a path: it has a slash or a file extension. */
export function extractFilePath(text: string): string | undefined {
  let found: string | undefined;
  for (const raw of stripUrls(text).split(/\s+/)) {
    const token = cleanToken(raw);
    if (!token || token === "/" || token === "." || token === "..") continue;
    if (token.includes("/") || FILE_LIKE.test(token)) found = token;
  }
  return found;
}

export function extractExtension(text: string, path?: string): string | undefined {
  const fromPath = path ? /\.([a-z][a-z0-9]*)$/i.exec(path)?.[1] : undefined;
  if (fromPath) return fromPath.toLowerCase();
  const match = /\b([a-z0-9]{1,6})\s+files?\b/i.exec(text);
  const candidate = match?.[1]?.toLowerCase();
  return candidate && !NOT_AN_EXTENSION.has(candidate) ? candidate : undefined;
}

export function extractDirectory(text: string): string | undefined {
  const match = DIR_RE.exec(stripUrls(text));
  const dir = match?.[1] ? cleanToken(match[1]) : undefined;
  if (!dir || NOT_A_DIR.has(dir.toLowerCase())) return undefined;
  return dir;
}

export function extractUrl(text: string): string | undefined {
  const match = text.match(URL_RE)?.[0];
  return match?.replace(/[).,!?;:]+$/, "");
}

export function extractQuoted(text: string): string | undefined {
  return DOUBLE_QUOTED.exec(text)?.[1] ?? SINGLE_QUOTED.exec(text)?.[1];
}

export function extractSearchPattern(text: string): string | undefined {
  const quoted = extractQuoted(text);
  if (quoted) return quoted;
  const match =
    /\b(?:for|containing)\s+["'`]?([^"'`\s]+)/i.exec(text) ??
    /\b(?:find|grep|search)\s+["'`]?([^"'`\s]+)/i.exec(text);
  const value = match?.[1] ? cleanToken(match[1]) : undefined;
  return value && !NOT_A_DIR.has(value.toLowerCase()) ? value : undefined;
}

export function extractSearchQuery(text: string): string | undefined {
  const match = /\b(?:search(?:\s+the\s+web)?\s+for|look\s+up|search|about|for)\s+(.+)/i.exec(stripUrls(text));
  const query = match?.[1]?.replace(/[?!.\s]+$/, "").trim();
  return query || undefined;
}

export function extractFunctionName(text: string): string | undefined {
  return FUNCTION_RE.exec(text)?.[1];
}

export function extractTestName(text: string): string | undefined {
  const named = /\btests?\s+(?:named|called)\s+["'`]?([\w\-. ]+?)["'`]?(?:$|[\s.,!?])/i.exec(text)?.[1];
  return named ?? (/\btests?\b/i.test(text) ? extractQuoted(text) : undefined);
}

export function extractCommitMessage(text: string): string | undefined {
  const quoted = /\bcommit\b.*?["'`](.+?)["'`]/i.exec(text)?.[1];
  if (quoted) return quoted;
  return /\bwith message\s+(.+)/i.exec(text)?.[1]?.trim();
}

export function extractTaskId(text: string): string | undefined {
  return TASK_ID_RE.exec(text)?.[1];
}

export function extractTaskDescription(text: string): string | undefined {
  const quoted = extractQuoted(text);
  if (quoted) return quoted;
  const match = /\b(?:remind me to|add (?:a )?(?:task|todo)(?: to)?|create (?:a )?(?:task|todo)(?: to)?|todo:?)\s+(.+)/i.exec(text);
  return match?.[1]?.replace(/[.!?\s]+$/, "").trim() || undefined;
}

export function extractTime(text: string): string | undefined {
  const clock = CLOCK_RE.exec(text)?.[1];
  if (clock) return clock.replace(/\s+/g, "").toLowerCase();
  return RELATIVE_TIME_RE.exec(text)?.[1]?.toLowerCase();
}

export function extractMeetingTitle(text: string): string | undefined {
  const quoted = extractQuoted(text);
  if (quoted) return quoted;
  const match = /\b(?:meeting|call)\s+(?:about|on|for|with)\s+(.+?)(?:\s+(?:at|on|today|tomorrow|next)\b|[.!?]*$)/i.exec(text);
  return match?.[1]?.trim() || undefined;
}

// ── Per category ──

function put(vars: Variables, key: string, value: string | undefined): void {
  if (value !== undefined && value !== "") vars[key] = value;
}

/** Extracts the variables relevant to an intent category. */
export function extractVariables(text: string, category: string): Variables {
  const vars: Variables = {};
  switch (category) {
    case "file": {
      const path = extractFilePath(text);
      put(vars, "path", path);
      put(vars, "extension", extractExtension(text, path));
      put(vars, "dir", extractDirectory(text));
      put(vars, "pattern", extractSearchPattern(text));
      break;
    }
    case "code":
      put(vars, "path", extractFilePath(text));
      put(vars, "dir", extractDirectory(text));
      put(vars, "function", extractFunctionName(text));
      put(vars, "test", extractTestName(text));
      put(vars, "message", extractCommitMessage(text));
      break;
    case "research":
      put(vars, "url", extractUrl(text));
      put(vars, "query", extractSearchQuery(text));
      break;
    case "task":
      put(vars, "task", extractTaskDescription(text));
      put(vars, "id", extractTaskId(text));
      put(vars, "time", extractTime(text));
      break;
    case "calendar":
      put(vars, "time", extractTime(text));
      put(vars, "title", extractMeetingTitle(text));
      break;
    default:
      put(vars, "quoted", extractQuoted(text));
      break;
  }
  return vars;
}
