import { describe, it, expect, afterEach } from "vitest";
import type { RuntimeContext } from "../../src/runtime/lifecycle.js";
import { str } from "../../src/utils/value.js";
import { ScriptedModelProvider } from "../helpers/model.js";
import { FakeProvider } from "../helpers/providers.js";
import { replyByJob, testRuntime } from "../helpers/runtime.js";

const NO_MEMORY = { memory: { enabled: false } };
const TASK_INTENT = '{"category": "task", "subcategory": "cleanup", "confidence": 0.8, "tier": 2}';
const CHAT_INTENT = '{"category": "chat", "subcategory": "general", "confidence": 0.8, "tier": 2}';

function notesProvider(): FakeProvider {
  return new FakeProvider("notes", {
    read: () => ({ success: true, data: str("standup at 10") }),
    list: () => ({ success: true, data: str("a.md") }),
  });
}

describe("Integration: conversational tool calls", () => {
  let runtime: RuntimeContext | undefined;

  afterEach(async () => {
    await runtime?.shutdown();
    runtime = undefined;
  });

  it("runs a batch of tool calls and synthesises over every outcome", async () => {
    const notes = notesProvider();
    const model = new ScriptedModelProvider(
      replyByJob({
        classify: CHAT_INTENT,
        converse: {
          text: "",
          toolCalls: [
            { id: "c1", name: "notes__read", input: { path: str("today.md") } },
            { id: "c2", name: "web__fetch", input: { url: str("https://example.com") } },
            { id: "c3", name: "notes__list", input: {}, error: "Arguments for notes__list are not valid JSON" },
          ],
        },
        synthesize: { text: "You have standup at 10." },
      }),
    );
    runtime = testRuntime({ model, providers: [notes], config: NO_MEMORY });

    const result = await runtime.orchestrator.process("tell me about my day", { threadId: "t1" });

    expect(result).toMatchObject({
      route: "plan",
      mode: "conversational",
      message: "You have standup at 10.",
      tokensUsed: 20,
      degraded: false,
    });
    expect(result.executionTrace).toMatchObject({ status: "completed", failedSteps: [2, 3], completedCount: 1 });
    expect(notes.calls.map((c) => c.action)).toEqual(["read"]);

    const synthesis = model.requests.find((r) => r.prompt.startsWith("User request:"));
    expect(synthesis?.prompt).toBe(
      [
        "User request:\ntell me about my day",
        "Execution results (completed):\nStep 1 (notes.read) output:\nstandup at 10",
        "Step 2 (web.fetch) failed: Unknown provider: web",
        "Step 3 (notes.list) failed: Arguments for notes__list are not valid JSON",
        "Answer the user directly using the results above. Mention any step that failed.",
      ].join("\n\n"),
    );
    expect(synthesis?.tools).toBeUndefined();
  });

  it("shows earlier turns of the thread to the model", async () => {
    const model = new ScriptedModelProvider(replyByJob({ classify: CHAT_INTENT, converse: { text: "Busy." } }));
    runtime = testRuntime({ model, config: NO_MEMORY });

    await runtime.orchestrator.process("tell me about my day", { threadId: "t1" });
    await runtime.orchestrator.process("and after lunch?", { threadId: "t1" });
    await runtime.orchestrator.process("and after lunch?", { threadId: "t2" });

    const conversations = model.requests.filter((r) => r.system?.startsWith("Identity:"));
    expect(conversations).toHaveLength(3);
    expect(conversations[0]?.system).not.toContain("Conversation so far:");
    expect(conversations[1]?.system).toContain("Conversation so far:\nUser: tell me about my day\nAssistant: Busy.\n\n");
    expect(conversations[2]?.system).not.toContain("Conversation so far:");
  });
});

describe("Integration: plan failures", () => {
  let runtime: RuntimeContext | undefined;

  afterEach(async () => {
    await runtime?.shutdown();
    runtime = undefined;
  });

  it("explains a generated plan the guardrails rejected", async () => {
    const notes = notesProvider();
    const model = new ScriptedModelProvider(
      replyByJob({
        classify: TASK_INTENT,
        plan: '{"steps": [{"id": 1, "provider": "shell", "action": "run", "input": {}, "depends": []}]}',
      }),
    );
    runtime = testRuntime({ model, providers: [notes], config: NO_MEMORY });

    const result = await runtime.orchestrator.process("tidy up my notes", { threadId: "t1" });

    expect(result).toMatchObject({
      route: "plan",
      mode: "planned",
      message: "I couldn't do that: Plan rejected by guardrails: step 1: unknown provider 'shell'",
      degraded: false,
    });
    expect(result.executionTrace).toBeUndefined();
    expect(notes.calls).toHaveLength(0);
    expect(model.requests.some((r) => r.prompt.startsWith("User request:"))).toBe(false);
    expect(await runtime.plans.getPattern("task.cleanup")).toBeNull();
  });

  it("explains a plan the model could not produce", async () => {
    const model = new ScriptedModelProvider(replyByJob({ classify: TASK_INTENT, plan: "no plan today" }));
    runtime = testRuntime({ model, providers: [notesProvider()], config: NO_MEMORY });

    const result = await runtime.orchestrator.process("tidy up my notes", { threadId: "t1" });
    expect(result).toMatchObject({
      message: "I couldn't do that: The model returned a plan that could not be parsed",
      degraded: false,
    });
  });
});

describe("Integration: plan reuse", () => {
  let runtime: RuntimeContext | undefined;

  afterEach(async () => {
    await runtime?.shutdown();
    runtime = undefined;
  });

  it("stores a generated plan that succeeded and reuses it without asking the model again", async () => {
    const notes = notesProvider();
    const model = new ScriptedModelProvider(
      replyByJob({
        classify: TASK_INTENT,
        plan: '{"description": "List the notes", "steps": [{"id": 1, "provider": "notes", "action": "list", "input": {}, "depends": []}]}',
        synthesize: { text: "Your notes are tidy." },
      }),
    );
    runtime = testRuntime({ model, providers: [notes], config: NO_MEMORY });

    const first = await runtime.orchestrator.process("tidy up my notes", { threadId: "t1" });
    expect(first).toMatchObject({ planSource: "generated", message: "Your notes are tidy." });

    const stored = await runtime.plans.getPattern("task.cleanup");
    expect(stored?.plan.description).toBe("List the notes");
    expect(stored?.stats).toMatchObject({ usageCount: 1, successCount: 1, successRate: 1 });

    const second = await runtime.orchestrator.process("tidy up my notes", { threadId: "t1" });
    expect(second).toMatchObject({ planSource: "pattern", message: "Your notes are tidy." });
    expect(model.requests.filter((r) => r.system?.startsWith("You plan"))).toHaveLength(1);
    expect(notes.calls.map((c) => c.action)).toEqual(["list", "list"]);

    const reused = await runtime.plans.getPattern("task.cleanup");
    expect(reused?.stats).toMatchObject({ usageCount: 2, successCount: 2 });
  });
});
