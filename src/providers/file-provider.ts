import { mkdir, readdir, readFile, stat, writeFile } from "node:fs/promises";
import { dirname, isAbsolute, join, relative, resolve } from "node:path";
import { ErrorCodes, userError } from "../errors/app-error.js";
import { asBool, asString, list, map, num, str, type Value } from "../utils/value.js";
import type { ActionDescription, CapabilityProvider, ProviderResult, StepCall } from "./types.js";

export interface FileProviderOptions {
  readonly root: string;
  readonly maxReadBytes?: number;
  readonly maxSearchResults?: number;
}

const SKIP_DIRS = new Set([".git", "node_modules", "dist", "coverage"]);

const ACTIONS: Readonly<Record<string, ActionDescription>> = {
  read: {
    description: "Read a text file",
    params: { path: { type: "string", description: "File path relative to the workspace", required: true } },
  },
  list: {
    description: "List the entries of a directory",
    params: { path: { type: "string", description: "Directory path, defaults to the workspace root" } },
  },
  search: {
    description: "Find lines containing a query in files under a directory",
    params: {
      query: { type: "string", description: "Text to look for", required: true },
      path: { type: "string", description: "Directory to search, defaults to the workspace root" },
      ignoreCase: { type: "boolean", description: "Case-insensitive match, default true" },
    },
  },
  info: {
    description: "Size, type and modification time of a path",
    params: { path: { type: "string", description: "File or directory path", required: true } },
  },
  write: {
    description: "Write text to a file, creating parent directories",
    params: {
      path: { type: "string", description: "File path relative to the workspace", required: true },
      content: { type: "string", description: "Text to write", required: true },
    },
  },
};

/** Filesystem access confined to one root directory. */
export class FileProvider implements CapabilityProvider {
  private readonly root: string;
  private readonly maxReadBytes: number;
  private readonly maxSearchResults: number;
  private readonly actions: ReadonlySet<string> = new Set(Object.keys(ACTIONS));

  constructor(opts: FileProviderOptions) {
    this.root = resolve(opts.root);
    this.maxReadBytes = opts.maxReadBytes ?? 262_144;
    this.maxSearchResults = opts.maxSearchResults ?? 50;
  }

  name(): string {
    return "file";
  }

  capabilities(): ReadonlySet<string> {
    return this.actions;
  }

  validateAction(action: string): boolean {
    return this.actions.has(action);
  }

  describeAction(action: string): ActionDescription | undefined {
    return ACTIONS[action];
  }

  async execute(call: StepCall, signal: AbortSignal): Promise<ProviderResult> {
    signal.throwIfAborted();
    switch (call.action) {
      case "read":
        return this.read(this.requirePath(call), signal);
      case "list":
        return this.list(this.resolvePath(asString(call.input["path"]) ?? "."));
      case "search":
        return this.search(call, signal);
      case "info":
        return this.info(this.requirePath(call));
      case "write":
        return this.write(call, signal);
      default:
        throw userError(ErrorCodes.ACTION_NOT_ALLOWED, `file provider does not support '${call.action}'`);
    }
  }

  // ── Actions ──

  private async read(path: string, signal: AbortSignal): Promise<ProviderResult> {
    const info = await stat(path);
    if (!info.isFile()) {
      throw userError(ErrorCodes.INVALID_INPUT, `${this.display(path)} is not a file`);
    }
    const content = await readFile(path, { encoding: "utf-8", signal });
    const truncated = Buffer.byteLength(content) > this.maxReadBytes;
    return {
      success: true,
      data: str(truncated ? content.slice(0, this.maxReadBytes) : content),
    };
  }

  private async list(path: string): Promise<ProviderResult> {
    const entries = await readdir(path, { withFileTypes: true });
    const items: Value[] = entries
      .sort((a, b) => a.name.localeCompare(b.name))
      .map((e) => map({ name: str(e.name), type: str(e.isDirectory() ? "directory" : "file") }));
    return { success: true, data: list(items) };
  }

  private async search(call: StepCall, signal: AbortSignal): Promise<ProviderResult> {
    const query = asString(call.input["query"]);
    if (!query) {
      throw userError(ErrorCodes.INVALID_INPUT, "search requires a non-empty 'query'");
    }
    const ignoreCase = asBool(call.input["ignoreCase"]) ?? true;
    const needle = ignoreCase ? query.toLowerCase() : query;
    const start = this.resolvePath(asString(call.input["path"]) ?? ".");
    const hits: Value[] = [];

    const walk = async (dir: string): Promise<void> => {
      for (const entry of await readdir(dir, { withFileTypes: true })) {
        if (hits.length >= this.maxSearchResults) return;
        signal.throwIfAborted();
        const full = join(dir, entry.name);
        if (entry.isDirectory()) {
          if (!SKIP_DIRS.has(entry.name)) await walk(full);
          continue;
        }
        if (!entry.isFile()) continue;
        const info = await stat(full);
        if (info.size > this.maxReadBytes) continue;
        const lines = (await readFile(full, "utf-8")).split("\n");
        for (let i = 0; i < lines.length && hits.length < this.maxSearchResults; i++) {
          const line = lines[i] ?? "";
          const haystack = ignoreCase ? line.toLowerCase() : line;
          if (haystack.includes(needle)) {
            hits.push(map({ path: str(this.display(full)), line: num(i + 1), text: str(line.trim()) }));
          }
        }
      }
    };

    await walk(start);
    return { success: true, data: list(hits) };
  }

  private async info(path: string): Promise<ProviderResult> {
    const info = await stat(path);
    return {
      success: true,
      data: map({
        path: str(this.display(path)),
        type: str(info.isDirectory() ? "directory" : "file"),
        size: num(info.size),
        modified: str(info.mtime.toISOString()),
      }),
    };
  }

  private async write(call: StepCall, signal: AbortSignal): Promise<ProviderResult> {
    const path = this.requirePath(call);
    const content = asString(call.input["content"]);
    if (content === undefined) {
      throw userError(ErrorCodes.INVALID_INPUT, "write requires 'content'");
    }
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content, { encoding: "utf-8", signal });
    return {
      success: true,
      data: map({ path: str(this.display(path)), bytes: num(Buffer.byteLength(content)) }),
    };
  }

  // ── Paths ──

  private requirePath(call: StepCall): string {
    const raw = asString(call.input["path"]);
    if (!raw) {
      throw userError(ErrorCodes.INVALID_INPUT, `${call.action} requires a 'path'`);
    }
    return this.resolvePath(raw);
  }

  /** Resolves against the root and rejects anything that lands outside it. */
  resolvePath(input: string): string {
    const target = resolve(this.root, input);
    const rel = relative(this.root, target);
    if (rel === ".." || rel.startsWith("../") || rel.startsWith("..\\") || isAbsolute(rel)) {
      throw userError(ErrorCodes.PATH_OUTSIDE_ROOT, `Path escapes the workspace: ${input}`, {
        suggestions: ["Use a path inside the configured workspace root"],
      });
    }
    return target;
  }

  private display(path: string): string {
    return relative(this.root, path) || ".";
  }
}
