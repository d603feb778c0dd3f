import { describe, it, expect } from "vitest";
import type { LocalReplyTemplateConfig } from "../../src/config/types.js";
import { LocalReplyEngine } from "../../src/orchestrator/local-replies.js";

describe("LocalReplyEngine built-ins", () => {
  const engine = new LocalReplyEngine([]);

  it("answers greetings", () => {
    expect(engine.match("hi")).toEqual({ templateId: "greeting", response: "Hey! How can I help?" });
    expect(engine.match("Hello!")?.templateId).toBe("greeting");
    expect(engine.match("  good morning team ")?.templateId).toBe("greeting");
  });

  it("answers acknowledgements", () => {
    expect(engine.match("thanks!")).toEqual({ templateId: "acknowledgement", response: "Got it." });
    expect(engine.match("OK")?.templateId).toBe("acknowledgement");
  });

  it("leaves greetings that carry a request to the pipeline", () => {
    expect(engine.match("hey, read main.py")).toBeNull();
    expect(engine.match("hi, can you list the files")).toBeNull();
  });

  it("does not match words that merely start like a greeting", () => {
    expect(engine.match("history of rome")).toBeNull();
    expect(engine.match("okra recipes")).toBeNull();
  });

  it("can be switched off", () => {
    expect(new LocalReplyEngine([], false).match("hi")).toBeNull();
  });
});

describe("LocalReplyEngine templates", () => {
  const templates: LocalReplyTemplateConfig[] = [
    { id: "ping", trigger: { type: "exact", pattern: "Ping" }, response: "pong" },
    { id: "help-keyword", trigger: { type: "keyword", words: ["help"] }, response: "keyword help", priority: 1 },
    { id: "help-prefix", trigger: { type: "prefix", pattern: "help" }, response: "prefix help", priority: 5 },
    { id: "status", trigger: { type: "command", name: "status" }, response: "All systems go" },
    { id: "night", trigger: { type: "regex", pattern: "^good night" }, response: "Sleep well, {user}" },
  ];
  const engine = new LocalReplyEngine(templates);

  it("matches exact triggers case-insensitively", () => {
    expect(engine.match(" ping ")).toEqual({ templateId: "ping", response: "pong" });
    expect(engine.match("ping me later")).toBeNull();
  });

  it("checks higher priority templates first", () => {
    expect(engine.match("help me")?.templateId).toBe("help-prefix");
    expect(engine.match("I need help")?.templateId).toBe("help-keyword");
  });

  it("matches slash commands with or without arguments", () => {
    expect(engine.match("/status")?.response).toBe("All systems go");
    expect(engine.match("/status verbose")?.response).toBe("All systems go");
    expect(engine.match("/statuses")).toBeNull();
  });

  it("takes configured templates before built-ins", () => {
    expect(engine.match("Good night")?.templateId).toBe("night");
  });

  it("fills placeholders", () => {
    expect(engine.match("good night", { userId: "dana" })?.response).toBe("Sleep well, dana");
    expect(engine.match("good night")?.response).toBe("Sleep well, there");

    const when = new Date(2024, 0, 15, 9, 30);
    const dated = new LocalReplyEngine([
      { id: "today", trigger: { type: "exact", pattern: "today" }, response: "It is {date} at {time}" },
    ]);
    expect(dated.match("today", { now: when })?.response).toBe(
      `It is ${when.toLocaleDateString()} at ${when.toLocaleTimeString()}`,
    );
  });
});
