import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { loadConfig, parseConfigText, readConfigSource, substituteEnv } from "../../src/config/loader.js";
import { parseConfig } from "../../src/config/schema.js";
import { AppError, ErrorCodes } from "../../src/errors/app-error.js";

describe("substituteEnv", () => {
  beforeEach(() => {
    process.env["TEST_TOKEN"] = "test-secret";
    process.env["TEST_MODEL"] = "test-model";
  });

  afterEach(() => {
    delete process.env["TEST_TOKEN"];
    delete process.env["TEST_MODEL"];
  });

  it("substitutes env vars in text", () => {
    expect(substituteEnv("key: ${env:TEST_TOKEN}")).toBe("key: test-secret");
  });

  it("substitutes multiple env vars", () => {
    expect(substituteEnv("${env:TEST_TOKEN}:${env:TEST_MODEL}")).toBe("test-secret:test-model");
  });

  it("throws a config error for missing env var", () => {
    expect(() => substituteEnv("${env:MISSING_VAR}")).toThrow(
      "Missing environment variable: MISSING_VAR",
    );
    expect(() => substituteEnv("${env:MISSING_VAR}")).toThrow(AppError);
  });

  it("leaves text without env vars unchanged", () => {
    expect(substituteEnv("no substitution here")).toBe("no substitution here");
  });

  it("only matches uppercase var names", () => {
    const text = "${env:lowercase}";
    expect(substituteEnv(text)).toBe(text);
  });
});

describe("parseConfig", () => {
  it("fills in defaults for an empty config", () => {
    const config = parseConfig({});
    expect(config.model.provider).toBe("none");
    expect(config.model.model).toBe("gpt-4o-mini");
    expect(config.gateway.breaker.failureThreshold).toBe(5);
    expect(config.gateway.breaker.cooldownMs).toBe(60_000);
    expect(config.executor.defaultStepTimeoutMs).toBe(300_000);
    expect(config.executor.stepTimeoutCeilingMs).toBe(120_000);
    expect(config.plans.maxSteps).toBe(8);
    expect(config.plans.generationMaxTokens).toBe(800);
    expect(config.memory.extractionThreshold).toBe(0.7);
    expect(config.memory.retrievalTimeoutMs).toBe(500);
    expect(config.classifier.minConfidence).toBe(0.7);
    expect(config.plans.builtinTemplates).toBe(true);
    expect(config.gateway.routing).toBe("smart");
    expect(config.model.tier).toBe(3);
    expect(config.model.local).toBeUndefined();
    expect(config.conversations).toEqual({ enabled: true, historyTurns: 6 });
  });

  it("defaults a local model to tier 1", () => {
    const config = parseConfig({ model: { local: { baseUrl: "http://localhost:8080/v1", model: "small" } } });
    expect(config.model.local).toEqual({
      baseUrl: "http://localhost:8080/v1",
      model: "small",
      tier: 1,
      timeoutMs: 30_000,
    });
  });

  it("rejects an unknown routing mode", () => {
    expect(() => parseConfig({ gateway: { routing: "fastest" } })).toThrow();
  });

  it("keeps provided values and defaults siblings", () => {
    const config = parseConfig({
      model: { provider: "openai", apiKey: "test-secret" },
      gateway: { breaker: { failureThreshold: 2 } },
    });
    expect(config.model.provider).toBe("openai");
    expect(config.model.apiKey).toBe("test-secret");
    expect(config.gateway.breaker.failureThreshold).toBe(2);
    expect(config.gateway.breaker.halfOpenMaxTrials).toBe(3);
  });

  it("rejects an unknown model provider", () => {
    expect(() => parseConfig({ model: { provider: "other" } })).toThrow();
  });

  it("rejects out-of-range thresholds", () => {
    expect(() => parseConfig({ memory: { extractionThreshold: 1.5 } })).toThrow();
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "conductor-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    delete process.env["TEST_KEY"];
  });

  it("returns defaults when the file is missing", () => {
    const config = loadConfig(join(dir, "missing.json"));
    expect(config.model.provider).toBe("none");
  });

  it("reads the file and substitutes env references", () => {
    process.env["TEST_KEY"] = "test-secret";
    const path = join(dir, "conductor.config.json");
    writeFileSync(path, JSON.stringify({ model: { provider: "openai", apiKey: "${env:TEST_KEY}" } }));
    const config = loadConfig(path);
    expect(config.model.apiKey).toBe("test-secret");
  });

  it("reports a missing file as absent content", () => {
    const path = join(dir, "missing.json");
    expect(readConfigSource(path)).toEqual({ path, content: null });
  });

  it("names the offending field of a schema violation", () => {
    const path = join(dir, "conductor.config.json");
    writeFileSync(path, JSON.stringify({ executor: { concurrency: "many" } }));
    const err: unknown = (() => {
      try {
        return loadConfig(path);
      } catch (e) {
        return e;
      }
    })();
    expect(err).toBeInstanceOf(AppError);
    expect(err).toMatchObject({
      code: ErrorCodes.CONFIG_INVALID,
      category: "user",
      message: `Invalid config in ${path}: executor.concurrency: Expected number, received string`,
    });
  });

  it("parses config text without touching the disk", () => {
    const config = parseConfigText('{"plans":{"builtinTemplates":false}}', "inline.json");
    expect(config.plans.builtinTemplates).toBe(false);
  });

  it("reports malformed JSON as a config error", () => {
    const path = join(dir, "bad.json");
    writeFileSync(path, "{ not json");
    expect(() => loadConfig(path)).toThrow("Config file is not valid JSON");
  });
});
