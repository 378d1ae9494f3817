import { StageConfigError } from "../../core/pipeline/errors.js";
import { createSink } from "../../core/pipeline/stages.js";
import type { StreamContext } from "../../core/pipeline/stream-context.js";
import type { Stage } from "../../core/pipeline/types.js";

export interface ConsoleSinkOptions {
  /** Prepended to every line */
  prefix?: string;
  /** Line writer, stdout by default */
  write?: (line: string) => void;
}

/**
 * Sink stage: renders each item on its own line.
 */
export function createConsoleSink<T>(options: ConsoleSinkOptions = {}): Stage<StreamContext<T>> {
  const prefix = options.prefix ?? "";
  const write = options.write ?? ((line: string) => process.stdout.write(`${line}\n`));

  return createSink<T>("consoleSink", (item) => {
    write(`${prefix}${String(item)}`);
  });
}

/**
 * Sink stage: appends each item to `into`.
 */
export function createCollectingSink<T>(into: T[], name = "collect"): Stage<StreamContext<T>> {
  return createSink<T>(name, (item) => {
    into.push(item);
  });
}

/**
 * Sink stage that hands the same input to several sinks, rewinding it before each one.
 * Every sink runs; the tee succeeds only if all of them do.
 * Members that write output would hand it over mid-tee, so they are refused.
 */
export function createTeeSink<T>(sinks: readonly Stage<StreamContext<T>>[], name = "tee"): Stage<StreamContext<T>> {
  const writers = sinks.filter((sink) => sink.capabilities.writes).map((sink) => `"${sink.name}" writes output`);
  if (writers.length > 0) {
    throw new StageConfigError(name, writers);
  }

  return {
    name,
    kind: "sink",
    capabilities: { reads: true, writes: false },
    process: async (context) => {
      let ok = true;
      for (const sink of sinks) {
        context.input.reset();
        const accepted = await sink.process(context);
        ok = ok && accepted;
      }
      return ok;
    },
  };
}
