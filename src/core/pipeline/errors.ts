/**
 * Error taxonomy for pipeline stages.
 *
 * Faults never cross the stage boundary: a stage converts them to a
 * {@link StageError}, logs it and reports `false`. Rejecting an item is not
 * an error at all and never shows up here.
 */

import type { StageError } from "./types.js";

export const ErrorCodes = {
  ORIGIN_UNAVAILABLE: "ORIGIN_UNAVAILABLE",
  STAGE_CONFIG_INVALID: "STAGE_CONFIG_INVALID",
  UNKNOWN_STAGE_KIND: "UNKNOWN_STAGE_KIND",
  STAGE_ERROR: "STAGE_ERROR",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export class PipelineError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PipelineError";
    this.code = code;
  }
}

/**
 * A source stage's origin does not exist or cannot be opened.
 */
export class OriginUnavailableError extends PipelineError {
  readonly origin: string;

  constructor(origin: string, reason: string, options?: { cause?: unknown }) {
    super(ErrorCodes.ORIGIN_UNAVAILABLE, `Origin unavailable: ${origin} (${reason})`, options);
    this.name = "OriginUnavailableError";
    this.origin = origin;
  }
}

export class StageConfigError extends PipelineError {
  readonly kind: string;
  readonly issues: string[];

  constructor(kind: string, issues: string[]) {
    super(ErrorCodes.STAGE_CONFIG_INVALID, `Invalid options for stage "${kind}": ${issues.join("; ")}`);
    this.name = "StageConfigError";
    this.kind = kind;
    this.issues = issues;
  }
}

export class UnknownStageKindError extends PipelineError {
  readonly kind: string;

  constructor(kind: string, known: readonly string[]) {
    super(ErrorCodes.UNKNOWN_STAGE_KIND, `Unknown stage kind "${kind}" (known: ${known.join(", ") || "none"})`);
    this.name = "UnknownStageKindError";
    this.kind = kind;
  }
}

/**
 * Extract an error code. An explicit `code` property wins (Node's ENOENT, EACCES, ...).
 */
export function extractErrorCode(error: unknown): string {
  if (typeof error === "object" && error !== null && "code" in error) {
    const { code } = error;
    if (typeof code === "string" || typeof code === "number") {
      return String(code);
    }
  }
  return ErrorCodes.STAGE_ERROR;
}

/**
 * Normalize anything thrown into a {@link StageError}.
 */
export function toStageError(error: unknown): StageError {
  return {
    code: extractErrorCode(error),
    message: error instanceof Error ? error.message : String(error),
    cause: error,
  };
}
