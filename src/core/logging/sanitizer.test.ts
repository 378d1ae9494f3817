import { afterEach, describe, expect, test } from "vitest";
import {
  DEFAULT_SANITIZE_OPTIONS,
  getSanitizeOptionsFromEnv,
  type SanitizeOptions,
  sanitizeForLogging,
  sanitizeRecord,
  truncateArray,
  truncateObject,
  truncateString,
} from "./sanitizer.js";

const options: SanitizeOptions = { ...DEFAULT_SANITIZE_OPTIONS };

describe("truncateString", () => {
  test("preserves short strings", () => {
    expect(truncateString("wow", 10)).toBe("wow");
  });

  test("truncates long strings with the total length", () => {
    expect(truncateString("abcdefghij", 4)).toBe("abcd... [truncated: 10 chars total]");
  });

  test("keeps a string of exactly max length", () => {
    expect(truncateString("level", 5)).toBe("level");
  });
});

describe("truncateArray", () => {
  test("preserves small arrays", () => {
    expect(truncateArray(["wa", "wow"], options)).toEqual(["wa", "wow"]);
  });

  test("summarizes arrays over the limit", () => {
    expect(truncateArray(["a", "b", "c", "d", "e"], options)).toEqual({
      __arrayInfo__: { length: 5, showing: 3, items: ["a", "b", "c"] },
    });
  });

  test("handles empty arrays", () => {
    expect(truncateArray([], options)).toEqual([]);
  });

  test("sanitizes nested items", () => {
    const result = truncateArray(["x".repeat(10)], { ...options, maxStringLength: 2 });
    expect(result).toEqual(["xx... [truncated: 10 chars total]"]);
  });
});

describe("truncateObject", () => {
  test("preserves shallow objects", () => {
    expect(truncateObject({ stage: "palindrome", accepted: true }, options)).toEqual({
      stage: "palindrome",
      accepted: true,
    });
  });

  test("replaces objects past max depth with their keys", () => {
    const result = truncateObject({ a: { b: { c: { d: 1 } } } }, options);
    expect(result).toEqual({
      a: { b: { c: { __keys__: ["d"], __depth__: "max depth exceeded" } } },
    });
  });

  test("never truncates preserved keys", () => {
    const longName = "s".repeat(20);
    const result = truncateObject({ stageName: longName }, { ...options, maxStringLength: 5 });
    expect(result.stageName).toBe(longName);
  });

  test("cuts truncate keys down to one sample", () => {
    const result = truncateObject({ tokens: ["wander", "wow", "cat"] }, options);
    expect(result.tokens).toEqual({
      __arrayInfo__: { length: 3, showing: 1, items: ["wander"] },
    });
  });

  test("lists keys of objects under truncate keys", () => {
    const result = truncateObject({ buffer: { pending: 1, committed: 2 } }, options);
    expect(result.buffer).toEqual({ __keys__: ["pending", "committed"] });
  });
});

describe("sanitizeForLogging", () => {
  test("passes primitives through", () => {
    expect(sanitizeForLogging(null)).toBeNull();
    expect(sanitizeForLogging(undefined)).toBeUndefined();
    expect(sanitizeForLogging(true)).toBe(true);
    expect(sanitizeForLogging(42)).toBe(42);
  });

  test("converts dates to ISO strings", () => {
    expect(sanitizeForLogging(new Date("2024-01-02T03:04:05.000Z"))).toBe("2024-01-02T03:04:05.000Z");
  });

  test("flattens errors", () => {
    const error = new Error("boom");
    const result = sanitizeForLogging(error, { ...options, maxStringLength: 100_000 });
    expect(result).toEqual({ name: "Error", message: "boom", stack: error.stack });
  });
});

describe("sanitizeRecord", () => {
  test("sanitizes a log record", () => {
    const result = sanitizeRecord({ event: "stage_complete", tokens: ["a", "b"], count: 2 });
    expect(result).toEqual({
      event: "stage_complete",
      tokens: { __arrayInfo__: { length: 2, showing: 1, items: ["a"] } },
      count: 2,
    });
  });
});

describe("getSanitizeOptionsFromEnv", () => {
  const keys = ["LOG_MAX_ARRAY_LENGTH", "LOG_MAX_STRING_LENGTH", "LOG_MAX_DEPTH"];
  const saved = Object.fromEntries(keys.map((key) => [key, process.env[key]]));

  afterEach(() => {
    for (const key of keys) {
      const value = saved[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  test("uses defaults when no env vars are set", () => {
    for (const key of keys) delete process.env[key];

    const result = getSanitizeOptionsFromEnv();
    expect(result.maxArrayLength).toBe(3);
    expect(result.maxStringLength).toBe(500);
    expect(result.maxDepth).toBe(3);
  });

  test("reads limits from the environment", () => {
    process.env.LOG_MAX_ARRAY_LENGTH = "7";
    process.env.LOG_MAX_STRING_LENGTH = "80";
    process.env.LOG_MAX_DEPTH = "not-a-number";

    const result = getSanitizeOptionsFromEnv();
    expect(result.maxArrayLength).toBe(7);
    expect(result.maxStringLength).toBe(80);
    expect(result.maxDepth).toBe(3);
  });
});
