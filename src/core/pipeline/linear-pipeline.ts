import { randomUUID } from "node:crypto";
import { createLogger, withTraceContext } from "../logging/logger.js";
import { toStageError } from "./errors.js";
import type { CombinationPolicy, PipelineRun, Stage, StageRecord } from "./types.js";

const logger = createLogger("pipeline");

export interface LinearPipelineOptions {
  /** Combination policy, "and" by default */
  policy?: CombinationPolicy;
  /** Name used in logs */
  name?: string;
}

/**
 * Ordered sequence of stages combined under an AND or OR policy.
 *
 * Stages run one after another against the same control value; each stage's
 * promise settles before the next one starts.
 *
 * - AND starts from `true` and stops at the first stage that answers `false`.
 *   The remaining stages are never invoked.
 * - OR starts from `false`, invokes every stage for its side effects and
 *   ends up `true` if any of them answered `true`.
 *
 * An empty pipeline returns the policy's neutral element: `true` for AND, `false` for OR.
 *
 * @example
 * const pipeline = new LinearPipeline<StreamContext<string>>({ policy: "and" });
 * pipeline.addLink(source);
 * pipeline.addLink(startsWith);
 * pipeline.addLink(sink);
 * const ok = await pipeline.process(new StreamContext());
 */
export class LinearPipeline<TValue> {
  readonly policy: CombinationPolicy;
  readonly name: string;
  private readonly stages: Stage<TValue>[] = [];

  constructor(options: LinearPipelineOptions = {}) {
    this.policy = options.policy ?? "and";
    this.name = options.name ?? "pipeline";
  }

  /**
   * Append a stage. Insertion order is execution order; no deduplication.
   */
  addLink(stage: Stage<TValue>): void {
    this.stages.push(stage);
  }

  get size(): number {
    return this.stages.length;
  }

  stageNames(): string[] {
    return this.stages.map((stage) => stage.name);
  }

  /**
   * Run every stage against `value` and return the combined result.
   */
  async process(value: TValue): Promise<boolean> {
    const run = await this.run(value);
    return run.result;
  }

  /**
   * Like {@link process}, with a report of what ran, what was skipped and how long it took.
   */
  async run(value: TValue): Promise<PipelineRun<TValue>> {
    const traceId = randomUUID();
    const log = withTraceContext(logger, traceId, this.name);
    const startTime = performance.now();
    const records: StageRecord[] = [];

    log.info({ event: "pipeline_start", policy: this.policy, stageCount: this.stages.length });

    let accumulator = this.policy === "and";
    let stoppedAt: number | null = null;

    for (const [index, stage] of this.stages.entries()) {
      const stageStart = performance.now();
      const accepted = await this.invoke(stage, value, log);
      const durationMs = performance.now() - stageStart;

      records.push({ index, name: stage.name, kind: stage.kind, accepted, durationMs });
      log.debug({ event: "stage_complete", stageName: stage.name, index, accepted, durationMs });

      if (this.policy === "and") {
        if (!accepted) {
          accumulator = false;
          stoppedAt = index;
          break;
        }
      } else if (accepted) {
        accumulator = true;
      }
    }

    const skipped = stoppedAt === null ? [] : this.stages.slice(stoppedAt + 1).map((stage) => stage.name);
    const status = skipped.length > 0 ? "short-circuited" : "completed";

    if (status === "short-circuited") {
      log.info({
        event: "pipeline_short_circuited",
        rejectedBy: records[records.length - 1]?.name,
        skipped,
      });
    }

    const durationMs = performance.now() - startTime;
    log.info({ event: "pipeline_complete", result: accumulator, status, durationMs });

    return {
      result: accumulator,
      value,
      policy: this.policy,
      status,
      stages: records,
      skipped,
      durationMs,
      traceId,
    };
  }

  // Stages are not supposed to throw; one that does still only costs a `false`.
  private async invoke(stage: Stage<TValue>, value: TValue, log: typeof logger): Promise<boolean> {
    try {
      return await stage.process(value);
    } catch (error) {
      const stageError = toStageError(error);
      log.error({ event: "stage_threw", stageName: stage.name, code: stageError.code, error: stageError.message });
      return false;
    }
  }
}
