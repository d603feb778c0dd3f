import { describe, it, expect } from "vitest";
import { ErrorCodes, userError } from "../../src/errors/app-error.js";
import { resolveInput, StepExecutor } from "../../src/executor/step-executor.js";
import { isFullSuccess } from "../../src/executor/types.js";
import type { PlanStep } from "../../src/plans/types.js";
import { ProviderRegistry } from "../../src/providers/registry.js";
import { list, num, str } from "../../src/utils/value.js";
import { silentLogger } from "../helpers/logger.js";
import { FakeProvider, waitFor } from "../helpers/providers.js";

function step(id: number, action: string, depends: number[] = [], input: PlanStep["input"] = {}): PlanStep {
  return { id, provider: "file", action, input, depends };
}

function setup(opts: ConstructorParameters<typeof StepExecutor>[2] = {}) {
  const file = new FakeProvider("file", {
    list: () => ({ success: true, data: str("notes.txt") }),
    read: (call) => ({ success: true, data: str(`contents of ${JSON.stringify(call.input["path"])}`) }),
    broken: () => ({ success: false, error: "disk unhappy" }),
    reject: () => {
      throw userError(ErrorCodes.INVALID_INPUT, "read requires a 'path'");
    },
    slow: async (_call, signal) => {
      await waitFor(1_000, signal);
      return { success: true };
    },
  });
  const executor = new StepExecutor(new ProviderRegistry([file]), silentLogger(), opts);
  return { file, executor };
}

describe("resolveInput", () => {
  const outputs = new Map([
    [1, str("notes.txt")],
    [2, list([str("a"), str("b")])],
  ]);

  it("substitutes a whole-string reference with the output value", () => {
    expect(resolveInput({ items: str("{{step.2}}") }, outputs)).toEqual({ items: list([str("a"), str("b")]) });
  });

  it("renders references embedded in text", () => {
    expect(resolveInput({ msg: str("file: {{ step.1 }}!") }, outputs)).toEqual({ msg: str("file: notes.txt!") });
  });

  it("leaves references to unknown steps untouched", () => {
    expect(resolveInput({ msg: str("{{step.9}}"), n: num(3) }, outputs)).toEqual({ msg: str("{{step.9}}"), n: num(3) });
  });
});

describe("StepExecutor.timeoutFor", () => {
  const { executor } = setup({ defaultStepTimeoutMs: 300_000, stepTimeoutCeilingMs: 2_000 });

  it("uses the step timeout capped at the ceiling", () => {
    expect(executor.timeoutFor({ timeoutSec: 1 })).toBe(1_000);
    expect(executor.timeoutFor({ timeoutSec: 30 })).toBe(2_000);
  });

  it("falls back to the default when unset or zero", () => {
    expect(executor.timeoutFor({})).toBe(300_000);
    expect(executor.timeoutFor({ timeoutSec: 0 })).toBe(300_000);
  });
});

describe("StepExecutor.executeStep", () => {
  it("classifies a provider error by its category", async () => {
    const { executor } = setup();
    const result = await executor.executeStep(step(1, "reject"));
    expect(result).toMatchObject({ success: false, error: "read requires a 'path'", errorCategory: "user" });
  });

  it("keeps a soft provider failure uncategorised", async () => {
    const { executor } = setup();
    const result = await executor.executeStep(step(1, "broken"));
    expect(result.success).toBe(false);
    expect(result.error).toBe("disk unhappy");
    expect(result.errorCategory).toBeUndefined();
  });

  it("times out a slow step as a temporary failure", async () => {
    const { executor } = setup({ defaultStepTimeoutMs: 20 });
    const result = await executor.executeStep(step(1, "slow"));
    expect(result).toMatchObject({
      success: false,
      error: "file.slow timed out after 20ms",
      errorCategory: "temporary",
    });
  });

  it("does not start a step whose signal is already aborted", async () => {
    const { executor, file } = setup();
    const controller = new AbortController();
    controller.abort();
    const result = await executor.executeStep(step(1, "read"), controller.signal);
    expect(result).toMatchObject({ error: "Cancelled before start", errorCategory: "system" });
    expect(file.calls).toHaveLength(0);
  });

  it("reports cancellation mid-run as a system failure", async () => {
    const { executor } = setup();
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 10);
    const result = await executor.executeStep(step(1, "slow"), controller.signal);
    expect(result).toMatchObject({ error: "Cancelled", errorCategory: "system" });
  });
});

describe("StepExecutor.executeBatch", () => {
  it("attempts every call and reports each failure separately", async () => {
    const { executor } = setup();
    const record = await executor.executeBatch([
      step(1, "list"),
      step(2, "delete"),
      { id: 3, provider: "web", action: "fetch", input: {} },
    ]);

    expect(record.results.map((r) => [r.stepId, r.success, r.error ?? null])).toEqual([
      [1, true, null],
      [2, false, "Action not allowed: file.delete"],
      [3, false, "Unknown provider: web"],
    ]);
    expect(record.results[1]?.errorCategory).toBe("user");
    expect(record.failedSteps).toEqual([2, 3]);
    expect(record.status).toBe("completed");
    expect(record.completedCount).toBe(1);
    expect(record.intentKey).toBe("adhoc");
  });

  it("fails a call with undecodable input without running it", async () => {
    const { executor, file } = setup();
    const record = await executor.executeBatch([
      { ...step(1, "read"), invalidInput: "Arguments for file__read are not valid JSON" },
      step(2, "list"),
    ]);

    expect(record.results[0]).toMatchObject({
      success: false,
      error: "Arguments for file__read are not valid JSON",
      errorCategory: "user",
    });
    expect(record.results[1]?.success).toBe(true);
    expect(file.calls.map((c) => c.action)).toEqual(["list"]);
    expect(record.status).toBe("completed");
  });

  it("fails when every call fails", async () => {
    const { executor } = setup();
    const record = await executor.executeBatch([step(1, "broken"), step(2, "broken")]);
    expect(record.status).toBe("failed");
  });

  it("never runs more calls at once than the concurrency limit", async () => {
    let active = 0;
    let peak = 0;
    const provider = new FakeProvider("file", {
      work: async (_call, signal) => {
        active++;
        peak = Math.max(peak, active);
        await waitFor(10, signal);
        active--;
        return { success: true };
      },
    });
    const executor = new StepExecutor(new ProviderRegistry([provider]), silentLogger(), { concurrency: 2 });
    const record = await executor.executeBatch([1, 2, 3, 4, 5].map((id) => step(id, "work")));
    expect(record.completedCount).toBe(5);
    expect(peak).toBe(2);
  });
});

describe("StepExecutor.executePlan", () => {
  it("feeds outputs of earlier steps into dependants", async () => {
    const { executor, file } = setup();
    const record = await executor.executePlan(
      [step(1, "list"), step(2, "read", [1], { path: str("{{step.1}}") })],
      undefined,
      { planId: "p1", intentKey: "file.read" },
    );

    expect(file.calls[1]?.input).toEqual({ path: str("notes.txt") });
    expect(record.results[1]?.data).toEqual(str('contents of {"kind":"string","value":"notes.txt"}'));
    expect(record).toMatchObject({ planId: "p1", intentKey: "file.read", status: "completed", completedCount: 2 });
    expect(isFullSuccess(record)).toBe(true);
  });

  it("blocks dependants of a failed step and fails the plan", async () => {
    const { executor, file } = setup();
    const record = await executor.executePlan([step(1, "broken"), step(2, "read", [1]), step(3, "list")]);

    expect(record.results.map((r) => r.stepId)).toEqual([1, 2, 3]);
    expect(record.results[1]).toMatchObject({ blocked: true, error: "Blocked by failed step 1", durationMs: 0 });
    expect(record.failedSteps).toEqual([1]);
    expect(record.blockedSteps).toEqual([2]);
    expect(record.status).toBe("failed");
    expect(file.calls.map((c) => c.action).sort()).toEqual(["broken", "list"]);
  });

  it("completes when only a leaf step fails", async () => {
    const { executor } = setup();
    const record = await executor.executePlan([step(1, "list"), step(2, "broken", [1])]);
    expect(record.status).toBe("completed");
    expect(record.failedSteps).toEqual([2]);
    expect(isFullSuccess(record)).toBe(false);
  });

  it("blocks steps that wait on a step that does not exist", async () => {
    const { executor } = setup();
    const record = await executor.executePlan([step(1, "list"), step(2, "read", [7])]);
    expect(record.results[1]).toMatchObject({ blocked: true, error: "Unresolvable dependency" });
    expect(record.blockedSteps).toEqual([2]);
  });
});
