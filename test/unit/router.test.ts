import { describe, it, expect } from "vitest";
import type { IntentPattern, PatternMatch } from "../../src/classifier/types.js";
import { choosePlanMode, directCall, hasToolVerbs } from "../../src/orchestrator/router.js";
import { ProviderRegistry } from "../../src/providers/registry.js";
import { str } from "../../src/utils/value.js";
import { FakeProvider } from "../helpers/providers.js";

const ok = () => ({ success: true });
const registry = new ProviderRegistry([new FakeProvider("file", { read: ok, search: ok })]);

function match(direct: IntentPattern["direct"], variables: Record<string, string>): PatternMatch {
  return {
    pattern: { name: "test", category: "file", subcategory: "read", keywords: [], confidence: 0.9, tier: 1, direct },
    variables,
  };
}

describe("hasToolVerbs", () => {
  it("spots imperative tool verbs as whole words", () => {
    expect(hasToolVerbs("please read main.py")).toBe(true);
    expect(hasToolVerbs("Look   up the weather")).toBe(true);
    expect(hasToolVerbs("summarise this thread")).toBe(true);
    expect(hasToolVerbs("hey there")).toBe(false);
    expect(hasToolVerbs("listen to this")).toBe(false);
  });
});

describe("choosePlanMode", () => {
  it("plans actionable categories", () => {
    expect(choosePlanMode({ category: "file" }, "what's in here")).toBe("planned");
    expect(choosePlanMode({ category: "calendar" }, "am I free")).toBe("planned");
  });

  it("plans chat that asks for a tool", () => {
    expect(choosePlanMode({ category: "chat" }, "fetch the weather")).toBe("planned");
  });

  it("converses otherwise", () => {
    expect(choosePlanMode({ category: "chat" }, "tell me a joke")).toBe("conversational");
  });
});

describe("directCall", () => {
  it("passes required variables under their own names", () => {
    const call = directCall(match({ provider: "file", action: "read", requires: ["path"] }, { path: "main.py" }), registry);
    expect(call).toEqual({ id: 1, provider: "file", action: "read", input: { path: str("main.py") } });
  });

  it("maps variables onto provider inputs and skips absent optional ones", () => {
    const binding = { provider: "file", action: "search", requires: ["pattern"], input: { query: "pattern", path: "dir" } };
    expect(directCall(match(binding, { pattern: "TODO" }), registry)?.input).toEqual({ query: str("TODO") });
    expect(directCall(match(binding, { pattern: "TODO", dir: "src" }), registry)?.input).toEqual({
      query: str("TODO"),
      path: str("src"),
    });
  });

  it("declines when a required variable is missing or empty", () => {
    const binding = { provider: "file", action: "read", requires: ["path"] };
    expect(directCall(match(binding, {}), registry)).toBeNull();
    expect(directCall(match(binding, { path: "" }), registry)).toBeNull();
  });

  it("declines unregistered actions and patterns without a binding", () => {
    expect(directCall(match({ provider: "file", action: "delete", requires: [] }, {}), registry)).toBeNull();
    expect(directCall(match(undefined, {}), registry)).toBeNull();
    expect(directCall(null, registry)).toBeNull();
  });
});
