import { createLogger } from "../logging/logger.js";
import { toStageError } from "./errors.js";
import type { StreamContext } from "./stream-context.js";
import type { InputStream, OutputStream } from "./streams.js";
import type { Stage, StageCapabilities, StageError, StageKind, StageResult } from "./types.js";

const logger = createLogger("stage");

type MaybePromise<T> = T | Promise<T>;

/**
 * The one function type behind every stream stage. Sources ignore `input`,
 * sinks ignore `output`. Returning a failed {@link StageResult} or throwing
 * both make the stage report `false`.
 */
export type StreamTransform<T> = (input: InputStream<T>, output: OutputStream<T>) => MaybePromise<void | StageResult>;

const CAPABILITIES: Record<Exclude<StageKind, "step">, StageCapabilities> = {
  source: { reads: false, writes: true },
  filter: { reads: true, writes: true },
  sink: { reads: true, writes: false },
};

function isStageFailure(result: unknown): result is Extract<StageResult, { success: false }> {
  return typeof result === "object" && result !== null && "success" in result && result.success === false;
}

function reportFailure(name: string, kind: StageKind, error: StageError): false {
  logger.error({
    event: "stage_failed",
    stageName: name,
    kind,
    code: error.code,
    error: error.message,
  });
  return false;
}

/**
 * Create a plain stage over any control value.
 *
 * `execute` answers with a boolean (accepted/rejected) or a {@link StageResult}.
 * Anything it throws is caught here, logged, and reported as `false`.
 *
 * @example
 * const nonEmpty = createStage<{ text: string }>("nonEmpty", ({ text }) => text.length > 0);
 */
export function createStage<TValue>(
  name: string,
  execute: (value: TValue) => MaybePromise<boolean | StageResult>,
): Stage<TValue> {
  return {
    name,
    kind: "step",
    capabilities: { reads: false, writes: false },
    process: async (value) => {
      try {
        const outcome = await execute(value);
        if (typeof outcome === "boolean") {
          return outcome;
        }
        return outcome.success ? true : reportFailure(name, "step", outcome.error);
      } catch (error) {
        return reportFailure(name, "step", toStageError(error));
      }
    },
  };
}

/**
 * Create a stage that works on the streams of a {@link StreamContext}.
 *
 * Writing stages hand their output over to the next stage on every exit path,
 * so a failing stage still leaves a well-defined (possibly partial) stream behind.
 */
export function createStreamStage<T>(
  name: string,
  kind: Exclude<StageKind, "step">,
  transform: StreamTransform<T>,
): Stage<StreamContext<T>> {
  const capabilities = CAPABILITIES[kind];

  return {
    name,
    kind,
    capabilities,
    process: async (context) => {
      try {
        const result = await transform(context.input, context.output);
        if (isStageFailure(result)) {
          return reportFailure(name, kind, result.error);
        }
        return true;
      } catch (error) {
        return reportFailure(name, kind, toStageError(error));
      } finally {
        if (capabilities.writes) {
          context.handoff();
        }
      }
    },
  };
}

/**
 * Stage that produces items from an external origin.
 */
export function createSource<T>(
  name: string,
  produce: (output: OutputStream<T>) => MaybePromise<void | StageResult>,
): Stage<StreamContext<T>> {
  return createStreamStage<T>(name, "source", (_input, output) => produce(output));
}

/**
 * Stage that reads every item and writes whatever it likes.
 *
 * @example
 * const upper = createTransform<string>("upper", (input, output) => {
 *   for (const token of input) output.write(token.toUpperCase());
 * });
 */
export function createTransform<T>(name: string, transform: StreamTransform<T>): Stage<StreamContext<T>> {
  return createStreamStage(name, "filter", transform);
}

/**
 * Stage that forwards the items satisfying `predicate`.
 *
 * Rejected items are dropped; they do not make the stage fail. The stage only
 * reports `false` when the predicate throws.
 */
export function createFilter<T>(name: string, predicate: (item: T) => boolean): Stage<StreamContext<T>> {
  return createTransform<T>(name, (input, output) => {
    let passed = 0;
    let rejected = 0;

    for (const item of input) {
      if (predicate(item)) {
        output.write(item);
        passed++;
      } else {
        rejected++;
      }
    }

    logger.debug({ event: "filter_complete", stageName: name, passed, rejected });
  });
}

/**
 * Stage that consumes the final stream.
 */
export function createSink<T>(name: string, consume: (item: T) => MaybePromise<void>): Stage<StreamContext<T>> {
  return createStreamStage<T>(name, "sink", async (input) => {
    for (const item of input) {
      await consume(item);
    }
  });
}
