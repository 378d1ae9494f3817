import { describe, expect, test } from "vitest";
import { ErrorCodes, OriginUnavailableError, toStageError } from "./errors.js";
import { createFilter, createSink, createSource, createStage, createTransform } from "./stages.js";
import { StreamContext } from "./stream-context.js";

describe("createStage", () => {
  test("passes boolean answers through", async () => {
    const positive = createStage<number>("positive", (value) => value > 0);

    expect(await positive.process(3)).toBe(true);
    expect(await positive.process(-3)).toBe(false);
    expect(positive.kind).toBe("step");
  });

  test("converts stage results to booleans", async () => {
    const stage = createStage<boolean>("result", (ok) =>
      ok ? { success: true } : { success: false, error: { code: "NOPE", message: "no" } },
    );

    expect(await stage.process(true)).toBe(true);
    expect(await stage.process(false)).toBe(false);
  });

  test("catches thrown errors and reports false", async () => {
    const stage = createStage<string>("throws", async () => {
      throw new Error("boom");
    });

    await expect(stage.process("x")).resolves.toBe(false);
  });
});

describe("createSource", () => {
  test("writes into the output and hands it over", async () => {
    const context = new StreamContext<string>();
    const source = createSource<string>("words", (output) => {
      output.writeAll(["wander", "wow"]);
    });

    expect(await source.process(context)).toBe(true);
    expect(context.peek()).toEqual(["wander", "wow"]);
    expect(context.handoffs).toBe(1);
    expect(source.capabilities).toEqual({ reads: false, writes: true });
  });

  test("reports false for a failed result and still hands over", async () => {
    const context = new StreamContext<string>(["stale"]);
    const source = createSource<string>("missing", () => ({
      success: false,
      error: toStageError(new OriginUnavailableError("nowhere.txt", "ENOENT")),
    }));

    expect(await source.process(context)).toBe(false);
    expect(context.peek()).toEqual([]);
    expect(context.handoffs).toBe(1);
  });
});

describe("createFilter", () => {
  const startsWithW = createFilter<string>("startsWithW", (token) => token.startsWith("w"));

  test("forwards matching items and succeeds regardless of how many pass", async () => {
    const context = new StreamContext(["wander", "cat", "wolf"]);

    expect(await startsWithW.process(context)).toBe(true);
    expect(context.peek()).toEqual(["wander", "wolf"]);
  });

  test("succeeds when nothing passes", async () => {
    const context = new StreamContext(["cat", "dog"]);

    expect(await startsWithW.process(context)).toBe(true);
    expect(context.peek()).toEqual([]);
  });

  test("gives the same partition for the same input twice", async () => {
    const input = ["wa", "cat", "wow", "noon"];
    const first = new StreamContext(input);
    const second = new StreamContext(input);

    await startsWithW.process(first);
    await startsWithW.process(second);

    expect(first.peek()).toEqual(["wa", "wow"]);
    expect(second.peek()).toEqual(first.peek());
  });

  test("reports false when the predicate throws and keeps the partial output", async () => {
    const context = new StreamContext(["ok", "bad", "later"]);
    const fragile = createFilter<string>("fragile", (token) => {
      if (token === "bad") throw new Error("cannot judge");
      return true;
    });

    expect(await fragile.process(context)).toBe(false);
    expect(context.peek()).toEqual(["ok"]);
  });
});

describe("createTransform", () => {
  test("may write transformed items", async () => {
    const context = new StreamContext(["wa", "wow"]);
    const upper = createTransform<string>("upper", (input, output) => {
      for (const token of input) output.write(token.toUpperCase());
    });

    expect(await upper.process(context)).toBe(true);
    expect(context.peek()).toEqual(["WA", "WOW"]);
    expect(upper.kind).toBe("filter");
  });
});

describe("createSink", () => {
  test("consumes the whole input without handing over", async () => {
    const received: string[] = [];
    const context = new StreamContext(["wow", "noon"]);
    const sink = createSink<string>("collect", (token) => {
      received.push(token);
    });

    expect(await sink.process(context)).toBe(true);
    expect(received).toEqual(["wow", "noon"]);
    expect(context.handoffs).toBe(0);
    expect(context.input.available()).toBe(0);
    expect(sink.capabilities).toEqual({ reads: true, writes: false });
  });

  test("reports false when consuming fails", async () => {
    const sink = createSink<string>("broken", async () => {
      throw Object.assign(new Error("pipe closed"), { code: "EPIPE" });
    });

    expect(await sink.process(new StreamContext(["x"]))).toBe(false);
  });
});

describe("toStageError", () => {
  test("prefers an explicit code", () => {
    const error = toStageError(new OriginUnavailableError("a.txt", "ENOENT"));
    expect(error.code).toBe(ErrorCodes.ORIGIN_UNAVAILABLE);
    expect(error.message).toBe("Origin unavailable: a.txt (ENOENT)");
  });

  test("falls back to STAGE_ERROR", () => {
    expect(toStageError("plain").code).toBe("STAGE_ERROR");
    expect(toStageError("plain").message).toBe("plain");
  });
});
