import { describe, expect, test } from "vitest";
import { DEFAULT_DELIMITERS, TokenSequence, tokenize } from "./tokenizer.js";

describe("tokenize", () => {
  test("splits on every delimiter and drops empty tokens", () => {
    expect(tokenize("wa wow, level; noon", " ;,").toArray()).toEqual(["wa", "wow", "level", "noon"]);
  });

  test("accepts delimiters as any iterable of characters", () => {
    expect(tokenize("wa wow, level; noon", new Set([" ", ";", ","])).toArray()).toEqual([
      "wa",
      "wow",
      "level",
      "noon",
    ]);
  });

  test("ignores leading, trailing and repeated delimiters", () => {
    expect(tokenize(",,  wow ;; ", " ,;").toArray()).toEqual(["wow"]);
  });

  test("yields nothing for empty or delimiter-only text", () => {
    expect(tokenize("", " ").toArray()).toEqual([]);
    expect(tokenize(" , ; ", " ,;").toArray()).toEqual([]);
  });

  test("returns the whole text when no delimiter occurs", () => {
    expect(tokenize("wander", " ").toArray()).toEqual(["wander"]);
  });

  test("matches delimiters outside the basic multilingual plane", () => {
    expect(tokenize("a\u{1F600}b\u{1F600}\u{1F600}c", "\u{1F600}").toArray()).toEqual(["a", "b", "c"]);
  });

  test("keeps astral characters inside tokens intact", () => {
    expect(tokenize("\u{1F600}x y\u{1F600}", " ").toArray()).toEqual(["\u{1F600}x", "y\u{1F600}"]);
  });

  test("uses whitespace and punctuation by default", () => {
    expect(DEFAULT_DELIMITERS).toBe(" ,;.\t\r\n");
    expect(tokenize("wow.\tnoon\r\nlevel").toArray()).toEqual(["wow", "noon", "level"]);
  });
});

describe("TokenSequence", () => {
  test("restarts from the beginning on every iteration", () => {
    const sequence = new TokenSequence("a b c", " ");

    expect(Array.from(sequence)).toEqual(["a", "b", "c"]);
    expect(Array.from(sequence)).toEqual(["a", "b", "c"]);
  });

  test("is lazy", () => {
    const iterator = new TokenSequence("first second", " ")[Symbol.iterator]();

    expect(iterator.next()).toEqual({ value: "first", done: false });
    expect(iterator.next()).toEqual({ value: "second", done: false });
    expect(iterator.next().done).toBe(true);
  });
});
