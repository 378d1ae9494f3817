/**
 * Core pipeline types.
 *
 * Every stage honours one contract: take the run's control value, do its work,
 * answer with a boolean. The pipeline composes those booleans and nothing else.
 */

/**
 * What a stage does with the streams of the control value.
 * - source: writes only (reads from an external origin)
 * - filter: reads and writes
 * - sink: reads only
 * - step: plain stage over an arbitrary control value
 */
export type StageKind = "source" | "filter" | "sink" | "step";

export interface StageCapabilities {
  reads: boolean;
  writes: boolean;
}

export interface Stage<TValue> {
  /** Diagnostic name, shown in logs and run reports */
  name: string;
  kind: StageKind;
  capabilities: StageCapabilities;
  /**
   * Run the stage against the shared control value.
   * Resolves `true` when the stage accepted/succeeded, `false` when it rejected or failed.
   * Never rejects.
   */
  process(value: TValue): Promise<boolean>;
}

export interface StageError {
  code: string;
  message: string;
  cause?: unknown;
}

/**
 * Internal outcome of a stage's work, converted to a boolean at the stage boundary.
 */
export type StageResult = { success: true } | { success: false; error: StageError };

/**
 * How individual stage outcomes combine.
 * - and: every stage must accept; stops at the first rejection
 * - or: at least one stage must accept; every stage always runs
 */
export type CombinationPolicy = "and" | "or";

export interface StageRecord {
  index: number;
  name: string;
  kind: StageKind;
  accepted: boolean;
  durationMs: number;
}

/**
 * Report of a single pipeline run.
 *
 * `status` is "short-circuited" when an AND pipeline stopped before its last stage;
 * the stages it never invoked are listed in `skipped`.
 */
export interface PipelineRun<TValue> {
  result: boolean;
  value: TValue;
  policy: CombinationPolicy;
  status: "completed" | "short-circuited";
  stages: StageRecord[];
  skipped: string[];
  durationMs: number;
  traceId: string;
}
