import { describe, it, expect } from "vitest";
import OpenAI from "openai";
import { ModelGateway } from "../../src/model/gateway.js";
import { classifyOpenAIError } from "../../src/model/openai-provider.js";
import { AppError, ErrorCodes, permanent, rateLimited, temporary, userError } from "../../src/errors/app-error.js";
import { ScriptedModelProvider } from "../helpers/model.js";
import { silentLogger } from "../helpers/logger.js";

const fastRetry = { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 5 };

function failing(): ScriptedModelProvider {
  return new ScriptedModelProvider(() => temporary(ErrorCodes.MODEL_UNAVAILABLE, "upstream down"));
}

describe("ModelGateway", () => {
  it("returns the provider response", async () => {
    const provider = new ScriptedModelProvider([{ text: "hello", tokensUsed: 7 }]);
    const gateway = new ModelGateway([provider], silentLogger(), { retry: fastRetry });
    const response = await gateway.generate({ prompt: "hi" });
    expect(response.text).toBe("hello");
    expect(response.tokensUsed).toBe(7);
  });

  it("retries temporary failures", async () => {
    const provider = new ScriptedModelProvider([
      temporary(ErrorCodes.MODEL_TIMEOUT, "slow"),
      { text: "done" },
    ]);
    const gateway = new ModelGateway([provider], silentLogger(), { retry: fastRetry });
    expect((await gateway.generate({ prompt: "x" })).text).toBe("done");
    expect(provider.callCount).toBe(2);
  });

  it("retries rate limits after the provider-supplied delay", async () => {
    const provider = new ScriptedModelProvider([
      rateLimited(ErrorCodes.MODEL_RATE_LIMIT, "slow down", 5),
      { text: "ok" },
    ]);
    const gateway = new ModelGateway([provider], silentLogger(), { retry: fastRetry });
    expect((await gateway.generate({ prompt: "x" })).text).toBe("ok");
    expect(provider.callCount).toBe(2);
  });

  it("surfaces the last rate-limit error with a wait suggestion", async () => {
    const provider = new ScriptedModelProvider(() => rateLimited(ErrorCodes.MODEL_RATE_LIMIT, "slow down", 2000));
    const gateway = new ModelGateway([provider], silentLogger(), {
      retry: { maxAttempts: 2, baseDelayMs: 1, maxDelayMs: 1 },
    });
    const err = await gateway.generate({ prompt: "x" }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(AppError);
    if (!(err instanceof AppError)) return;
    expect(err.category).toBe("rate_limited");
    expect(err.suggestions).toEqual(["Wait 2s before retrying", "Check your API quota"]);
    expect(provider.callCount).toBe(2);
  });

  it("does not retry permanent or user failures", async () => {
    const perm = new ScriptedModelProvider([permanent(ErrorCodes.MODEL_UNAVAILABLE, "bad key")]);
    const gw1 = new ModelGateway([perm], silentLogger(), { retry: fastRetry });
    await expect(gw1.generate({ prompt: "x" })).rejects.toThrow("bad key");
    expect(perm.callCount).toBe(1);

    const user = new ScriptedModelProvider([userError(ErrorCodes.MODEL_INVALID_RESPONSE, "bad request")]);
    const gw2 = new ModelGateway([user], silentLogger(), { retry: fastRetry });
    await expect(gw2.generate({ prompt: "x" })).rejects.toThrow("bad request");
    expect(user.callCount).toBe(1);
  });

  it("opens the breaker after five failures and fails fast", async () => {
    let clock = 0;
    const provider = failing();
    const gateway = new ModelGateway([provider], silentLogger(), {
      retry: { maxAttempts: 1 },
      breaker: { now: () => clock },
    });

    for (let i = 0; i < 5; i++) {
      await expect(gateway.generate({ prompt: "x" })).rejects.toThrow("upstream down");
    }
    expect(gateway.isAvailable()).toBe(false);

    const err = await gateway.generate({ prompt: "x" }).catch((e: unknown) => e);
    expect(err instanceof AppError && err.code).toBe(ErrorCodes.CIRCUIT_OPEN);
    expect(provider.callCount).toBe(5);

    clock = 60_000;
    expect(gateway.isAvailable()).toBe(true);
    expect(gateway.health()).toEqual([{ provider: "scripted", tier: 3, state: "half_open", consecutiveFailures: 5 }]);
  });

  it("does not count user errors against the breaker", async () => {
    const provider = new ScriptedModelProvider(() => userError(ErrorCodes.MODEL_INVALID_RESPONSE, "bad input"));
    const gateway = new ModelGateway([provider], silentLogger(), { retry: { maxAttempts: 1 } });
    for (let i = 0; i < 8; i++) {
      await expect(gateway.generate({ prompt: "x" })).rejects.toThrow("bad input");
    }
    expect(gateway.health()[0]?.state).toBe("closed");
    expect(gateway.isAvailable()).toBe(true);
  });

  it("neither retries, trips the breaker nor fails over on rejected credentials", async () => {
    const rejected = new ScriptedModelProvider(() =>
      classifyOpenAIError(OpenAI.APIError.generate(401, { message: "bad key" }, "bad key", {})),
    );
    const backup = new ScriptedModelProvider([{ text: "from backup" }], "backup");
    const gateway = new ModelGateway([rejected, backup], silentLogger(), { retry: fastRetry });

    for (let i = 0; i < 6; i++) {
      await expect(gateway.generate({ prompt: "x" })).rejects.toMatchObject({
        category: "user",
        code: ErrorCodes.MODEL_AUTH,
      });
    }
    expect(rejected.callCount).toBe(6);
    expect(backup.callCount).toBe(0);
    expect(gateway.health()[0]).toMatchObject({ state: "closed", consecutiveFailures: 0 });
  });

  it("falls over to the next provider", async () => {
    const primary = failing();
    const secondary = new ScriptedModelProvider([{ text: "from backup" }], "backup");
    const gateway = new ModelGateway([primary, secondary], silentLogger(), {
      retry: { maxAttempts: 2, baseDelayMs: 1, maxDelayMs: 1 },
    });
    const response = await gateway.generate({ prompt: "x" });
    expect(response.text).toBe("from backup");
    expect(response.provider).toBe("backup");
    expect(primary.callCount).toBe(2);
  });

  it("assembles streamed chunks", async () => {
    const provider = new ScriptedModelProvider([{ chunks: ["Hel", "lo", " there"] }]);
    const gateway = new ModelGateway([provider], silentLogger(), { retry: fastRetry });
    const seen: string[] = [];
    const response = await gateway.stream({ prompt: "x" }, (c) => seen.push(c));
    expect(seen).toEqual(["Hel", "lo", " there"]);
    expect(response.text).toBe("Hello there");
    expect(provider.requests[0]?.stream).toBe(true);
  });

  it("never retries a stream that already emitted output", async () => {
    const provider = new ScriptedModelProvider([
      { chunks: ["Hel"], failWith: temporary(ErrorCodes.MODEL_UNAVAILABLE, "connection reset") },
      { chunks: ["Hello"] },
    ]);
    const backup = new ScriptedModelProvider([{ chunks: ["Hello"] }], "backup");
    const gateway = new ModelGateway([provider, backup], silentLogger(), { retry: fastRetry });
    const seen: string[] = [];
    await expect(gateway.stream({ prompt: "x" }, (c) => seen.push(c))).rejects.toThrow("connection reset");
    expect(seen).toEqual(["Hel"]);
    expect(provider.callCount).toBe(1);
    expect(backup.callCount).toBe(0);
  });

  it("retries a stream that failed before any output", async () => {
    const provider = new ScriptedModelProvider([
      temporary(ErrorCodes.MODEL_UNAVAILABLE, "connect failed"),
      { chunks: ["Hi"] },
    ]);
    const gateway = new ModelGateway([provider], silentLogger(), { retry: fastRetry });
    const seen: string[] = [];
    const response = await gateway.stream({ prompt: "x" }, (c) => seen.push(c));
    expect(seen).toEqual(["Hi"]);
    expect(response.text).toBe("Hi");
  });

  it("reports unavailability without providers", async () => {
    const gateway = new ModelGateway([], silentLogger());
    expect(gateway.isAvailable()).toBe(false);
    expect(gateway.hasProviders).toBe(false);
    await expect(gateway.generate({ prompt: "x" })).rejects.toThrow("No model provider configured");
  });
});

describe("ModelGateway routing", () => {
  function pair(): { local: ScriptedModelProvider; cloud: ScriptedModelProvider } {
    return {
      local: new ScriptedModelProvider(() => ({ text: "local" }), "local", 1),
      cloud: new ScriptedModelProvider(() => ({ text: "cloud" }), "cloud", 3),
    };
  }

  it("sends a simple request to the smaller model first", async () => {
    const { local, cloud } = pair();
    const gateway = new ModelGateway([cloud, local], silentLogger(), { retry: fastRetry });
    const response = await gateway.generate({ prompt: "what time is it" });
    expect(response.provider).toBe("local");
    expect(cloud.callCount).toBe(0);
  });

  it("sends a request that needs tier 3 to the frontier model", async () => {
    const { local, cloud } = pair();
    const gateway = new ModelGateway([local, cloud], silentLogger(), { retry: fastRetry });
    const response = await gateway.generate({ prompt: "x", tier: 3 });
    expect(response.provider).toBe("cloud");
    expect(local.callCount).toBe(0);
  });

  it("falls back to the smaller model when the frontier one is down", async () => {
    const local = new ScriptedModelProvider(() => ({ text: "local" }), "local", 1);
    const cloud = new ScriptedModelProvider(() => temporary(ErrorCodes.MODEL_UNAVAILABLE, "down"), "cloud", 3);
    const gateway = new ModelGateway([local, cloud], silentLogger(), { retry: { maxAttempts: 1 } });
    const response = await gateway.generate({ prompt: "x", tier: 3 });
    expect(response.provider).toBe("local");
    expect(cloud.callCount).toBe(1);
  });

  it("never calls the frontier model in local mode", async () => {
    const { local, cloud } = pair();
    const gateway = new ModelGateway([cloud, local], silentLogger(), { retry: fastRetry, routing: "local" });
    expect((await gateway.generate({ prompt: "x", tier: 3 })).provider).toBe("local");
    expect(cloud.callCount).toBe(0);

    const cloudOnly = new ModelGateway([cloud], silentLogger(), { routing: "local" });
    expect(cloudOnly.isAvailable()).toBe(false);
    await expect(cloudOnly.generate({ prompt: "x" })).rejects.toThrow(
      "No model provider serves routing mode 'local'",
    );
  });

  it("prefers the frontier model in cloud mode", async () => {
    const { local, cloud } = pair();
    const gateway = new ModelGateway([local, cloud], silentLogger(), { retry: fastRetry, routing: "cloud" });
    expect((await gateway.generate({ prompt: "hi", tier: 1 })).provider).toBe("cloud");
  });

  it("reports each provider's tier", () => {
    const { local, cloud } = pair();
    const gateway = new ModelGateway([cloud, local], silentLogger());
    expect(gateway.health().map((h) => [h.provider, h.tier])).toEqual([
      ["cloud", 3],
      ["local", 1],
    ]);
  });
});
