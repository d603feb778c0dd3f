import { describe, it, expect } from "vitest";
import { headerReader, parseRetryAfterHeaders, parseRetryAfterMessage } from "../../src/model/retry-after.js";

describe("parseRetryAfterHeaders", () => {
  it("prefers retry-after-ms", () => {
    const read = headerReader({ "retry-after-ms": "1500", "retry-after": "9" });
    expect(parseRetryAfterHeaders(read)).toBe(1500);
  });

  it("reads retry-after in seconds", () => {
    expect(parseRetryAfterHeaders(headerReader({ "Retry-After": "3" }))).toBe(3000);
  });

  it("reads retry-after as an HTTP date", () => {
    const now = Date.parse("Wed, 21 Oct 2026 07:28:00 GMT");
    const read = headerReader({ "retry-after": "Wed, 21 Oct 2026 07:28:30 GMT" });
    expect(parseRetryAfterHeaders(read, now)).toBe(30_000);
  });

  it("clamps past dates to zero", () => {
    const now = Date.parse("Wed, 21 Oct 2026 07:28:00 GMT");
    const read = headerReader({ "retry-after": "Wed, 21 Oct 2026 07:27:00 GMT" });
    expect(parseRetryAfterHeaders(read, now)).toBe(0);
  });

  it("reads a Headers instance", () => {
    const headers = new Headers({ "retry-after": "2" });
    expect(parseRetryAfterHeaders(headerReader(headers))).toBe(2000);
  });

  it("returns undefined for missing or garbage values", () => {
    expect(parseRetryAfterHeaders(headerReader({}))).toBeUndefined();
    expect(parseRetryAfterHeaders(headerReader({ "retry-after": "soon" }))).toBeUndefined();
    expect(parseRetryAfterHeaders(headerReader(undefined))).toBeUndefined();
  });
});

describe("parseRetryAfterMessage", () => {
  it("parses seconds", () => {
    expect(parseRetryAfterMessage("Rate limit reached. Please try again in 20s.")).toBe(20_000);
    expect(parseRetryAfterMessage("retry after 1.5 seconds")).toBe(1500);
  });

  it("parses milliseconds and minutes", () => {
    expect(parseRetryAfterMessage("Try again in 250ms")).toBe(250);
    expect(parseRetryAfterMessage("retry after 2 minutes")).toBe(120_000);
  });

  it("returns undefined without a hint", () => {
    expect(parseRetryAfterMessage("quota exceeded")).toBeUndefined();
  });
});
