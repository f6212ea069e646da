// Unit and property tests for shared utilities

import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { errorMessage, isValidSessionId, preview, truncateForSynthesis } from "./utils.js";

// ─── truncateForSynthesis ───────────────────────────────────────────────────────

describe("truncateForSynthesis", () => {
  it("returns short text unchanged", () => {
    expect(truncateForSynthesis("hello", 10)).toBe("hello");
  });

  it("returns text exactly at the bound unchanged", () => {
    expect(truncateForSynthesis("0123456789", 10)).toBe("0123456789");
  });

  it("cuts longer text and ends it with an ellipsis", () => {
    expect(truncateForSynthesis("abcdefghijk", 10)).toBe("abcdefg...");
  });

  it("raises tiny bounds to fit the ellipsis", () => {
    expect(truncateForSynthesis("abcdef", 2)).toBe("a...");
  });

  it("never exceeds the bound and keeps a prefix of the input", () => {
    fc.assert(
      fc.property(fc.string({ maxLength: 300 }), fc.integer({ min: 4, max: 200 }), (text, max) => {
        const out = truncateForSynthesis(text, max);
        expect(out.length).toBe(Math.min(text.length, max));
        if (text.length > max) {
          expect(out.endsWith("...")).toBe(true);
          expect(text.startsWith(out.slice(0, -3))).toBe(true);
        } else {
          expect(out).toBe(text);
        }
      }),
      { numRuns: 200 },
    );
  });
});

// ─── isValidSessionId ───────────────────────────────────────────────────────────

describe("isValidSessionId", () => {
  it("accepts client-generated ids", () => {
    expect(isValidSessionId("s1")).toBe(true);
    expect(isValidSessionId("session_1718_ab-CD")).toBe(true);
    expect(isValidSessionId("a".repeat(128))).toBe(true);
  });

  it("rejects empty, long or unsafe ids", () => {
    expect(isValidSessionId("")).toBe(false);
    expect(isValidSessionId("a".repeat(129))).toBe(false);
    expect(isValidSessionId("bad id")).toBe(false);
    expect(isValidSessionId("../etc")).toBe(false);
  });
});

// ─── misc ───────────────────────────────────────────────────────────────────────

describe("errorMessage", () => {
  it("reads Error messages and stringifies anything else", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("plain")).toBe("plain");
    expect(errorMessage(42)).toBe("42");
  });
});

describe("preview", () => {
  it("marks cut text", () => {
    expect(preview("abcdef", 3)).toBe("abc...");
    expect(preview("abc", 3)).toBe("abc");
  });
});
