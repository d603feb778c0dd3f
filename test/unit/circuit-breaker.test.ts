import { describe, it, expect, beforeEach } from "vitest";
import { CircuitBreaker } from "../../src/model/circuit-breaker.js";

describe("CircuitBreaker", () => {
  let clock: number;
  let breaker: CircuitBreaker;

  beforeEach(() => {
    clock = 0;
    breaker = new CircuitBreaker("test", { now: () => clock });
  });

  function fail(times: number): void {
    for (let i = 0; i < times; i++) {
      expect(breaker.tryAcquire()).toBe(true);
      breaker.recordFailure();
    }
  }

  it("stays closed below the failure threshold", () => {
    fail(4);
    expect(breaker.currentState).toBe("closed");
    expect(breaker.canAttempt()).toBe(true);
  });

  it("opens after five consecutive failures and fails fast", () => {
    fail(5);
    expect(breaker.currentState).toBe("open");
    expect(breaker.tryAcquire()).toBe(false);
  });

  it("resets the failure count on success", () => {
    fail(4);
    breaker.tryAcquire();
    breaker.recordSuccess();
    fail(4);
    expect(breaker.currentState).toBe("closed");
  });

  it("goes half-open after the cooldown and admits three trials", () => {
    fail(5);
    clock = 59_999;
    expect(breaker.canAttempt()).toBe(false);
    clock = 60_000;
    expect(breaker.currentState).toBe("half_open");
    expect(breaker.tryAcquire()).toBe(true);
    expect(breaker.tryAcquire()).toBe(true);
    expect(breaker.tryAcquire()).toBe(true);
    expect(breaker.tryAcquire()).toBe(false);
  });

  it("closes on a successful trial", () => {
    fail(5);
    clock = 60_000;
    expect(breaker.tryAcquire()).toBe(true);
    breaker.recordSuccess();
    expect(breaker.currentState).toBe("closed");
    expect(breaker.consecutiveFailures).toBe(0);
  });

  it("reopens on a failed trial and restarts the cooldown", () => {
    fail(5);
    clock = 60_000;
    expect(breaker.tryAcquire()).toBe(true);
    breaker.recordFailure();
    expect(breaker.currentState).toBe("open");
    clock = 100_000;
    expect(breaker.canAttempt()).toBe(false);
    clock = 120_000;
    expect(breaker.canAttempt()).toBe(true);
  });

  it("returns a released trial slot", () => {
    fail(5);
    clock = 60_000;
    breaker.tryAcquire();
    breaker.tryAcquire();
    breaker.tryAcquire();
    expect(breaker.canAttempt()).toBe(false);
    breaker.release();
    expect(breaker.canAttempt()).toBe(true);
  });

  it("honours custom thresholds", () => {
    const strict = new CircuitBreaker("strict", { failureThreshold: 1, cooldownMs: 10, now: () => clock });
    strict.tryAcquire();
    strict.recordFailure();
    expect(strict.currentState).toBe("open");
    clock = 10;
    expect(strict.currentState).toBe("half_open");
  });
});
