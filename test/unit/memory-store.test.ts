import { describe, it, expect, beforeEach } from "vitest";
import { extractKeywords, loadStopwords, relevance } from "../../src/memory/retrieval.js";
import { MemoryStore } from "../../src/memory/store.js";
import type { MemoryFact, StoredFact } from "../../src/memory/types.js";
import { InMemoryStore } from "../../src/store/in-memory-store.js";
import type { ScanOptions, StoredRecord } from "../../src/store/types.js";
import { silentLogger } from "../helpers/logger.js";

const HOUR = 3_600_000;
const NOW = 1_700_000_000_000;
const stopwords = loadStopwords();

function profile(field: string, value: string, overwrite = false, confidence = 0.9): MemoryFact {
  return { kind: "profile", field, value, confidence, overwrite };
}

describe("extractKeywords", () => {
  it("drops stop words, short words and repeats", () => {
    expect(extractKeywords("What is my name? My NAME!", stopwords)).toEqual(["name"]);
    expect(extractKeywords("deploy the staging server", stopwords)).toEqual(["deploy", "staging", "server"]);
  });
});

describe("relevance", () => {
  const fact: StoredFact = { kind: "profile", field: "name", value: "Dana", confidence: 0.9, updatedAt: NOW };

  it("weights keywords, recency and confidence", () => {
    expect(relevance(fact, ["name"], NOW)).toBeCloseTo(0.98, 10);
    expect(relevance(fact, ["name", "city"], NOW)).toBeCloseTo(0.68, 10);
    expect(relevance(fact, ["city"], NOW)).toBeCloseTo(0.38, 10);
  });

  it("decays with age", () => {
    expect(relevance(fact, ["name"], NOW + 720 * HOUR)).toBeCloseTo(0.6 + 0.2 * Math.exp(-1) + 0.18, 10);
  });

  it("never exceeds 1", () => {
    const score = relevance({ ...fact, confidence: 1 }, ["name"], NOW);
    expect(score).toBeLessThanOrEqual(1);
    expect(score).toBeCloseTo(1, 10);
  });
});

describe("MemoryStore", () => {
  let memory: MemoryStore;

  beforeEach(() => {
    memory = new MemoryStore(new InMemoryStore({ now: () => NOW }), silentLogger(), { stopwords, now: () => NOW });
  });

  it("keeps the first value unless the new fact overwrites", async () => {
    expect(await memory.ingest([profile("name", "Dana")])).toBe(1);
    expect(await memory.ingest([profile("name", "Sam")])).toBe(0);
    expect((await memory.list())[0]).toMatchObject({ field: "name", value: "Dana" });

    expect(await memory.ingest([profile("name", "Sam", true)])).toBe(1);
    expect((await memory.list())[0]).toMatchObject({ field: "name", value: "Sam" });
  });

  it("normalises keys and ignores facts below the threshold", async () => {
    expect(await memory.ingest([profile(" Name ", " Dana "), profile("city", "Lisbon", false, 0.5)])).toBe(1);
    expect(await memory.list()).toEqual([
      { kind: "profile", field: "name", value: "Dana", confidence: 0.9, updatedAt: NOW },
    ]);
  });

  it("keeps namespaces apart", async () => {
    await memory.ingest([profile("name", "Dana")], "u1");
    expect(await memory.list("u2")).toEqual([]);
    expect(await memory.list("u1")).toHaveLength(1);
  });

  it("retrieves facts ranked by relevance", async () => {
    await memory.ingest([profile("name", "Dana"), profile("preference", "tabs over spaces", false, 0.7)]);

    const hits = await memory.retrieve("what is my name");
    expect(hits.map((h) => h.fact.kind === "profile" && h.fact.field)).toEqual(["name", "preference"]);
    expect(hits[0]?.score).toBeCloseTo(0.98, 10);
    expect(hits[1]?.score).toBeCloseTo(0.34, 10);

    const strict = await memory.retrieve("what is my name", { minRelevance: 0.5 });
    expect(strict).toHaveLength(1);
    expect(await memory.retrieve("what is my name", { limit: 1 })).toHaveLength(1);
  });

  it("returns nothing for a query of only stop words", async () => {
    await memory.ingest([profile("name", "Dana")]);
    expect(await memory.retrieve("what is it")).toEqual([]);
  });

  it("summarises profile and actions", async () => {
    await memory.ingest([
      profile("name", "Dana"),
      { kind: "action", trigger: "Deploy", action: "run the release script", confidence: 0.8, overwrite: false },
    ]);
    expect(await memory.summary()).toBe('Profile:\n- name: Dana\n\nActions:\n- When "deploy": run the release script');
  });

  it("gives up on retrieval after the deadline", async () => {
    class SlowStore extends InMemoryStore {
      override async scan(collection: string, opts?: ScanOptions): Promise<StoredRecord[]> {
        await new Promise((resolve) => setTimeout(resolve, 50));
        return super.scan(collection, opts);
      }
    }
    const slow = new MemoryStore(new SlowStore(), silentLogger(), { stopwords });
    await slow.ingest([profile("name", "Dana")]);
    expect(await slow.retrieveWithin("my name", 5)).toBeNull();
    expect(await slow.retrieveWithin("my name", 1_000)).toHaveLength(1);
  });
});
