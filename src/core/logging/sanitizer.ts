/**
 * Log sanitization for large values.
 *
 * Truncates long arrays (token lists, stream snapshots), deep objects and long
 * strings so debug logs stay readable. LOG_SANITIZE=false turns it off.
 */

export interface SanitizeOptions {
  /** Maximum number of array items to show */
  maxArrayLength: number;
  /** Maximum string length before truncation */
  maxStringLength: number;
  /** Maximum object depth before showing keys only */
  maxDepth: number;
  /** Current depth (internal, for recursion tracking) */
  currentDepth: number;
  /** Keys that are never truncated */
  preserveKeys: string[];
  /** Keys that are always cut down to a single sample */
  truncateKeys: string[];
}

export const DEFAULT_SANITIZE_OPTIONS: SanitizeOptions = {
  maxArrayLength: 3,
  maxStringLength: 500,
  maxDepth: 3,
  currentDepth: 0,
  preserveKeys: ["event", "component", "traceId", "pipeline", "stageName", "policy"],
  truncateKeys: ["tokens", "items", "buffer"],
};

export function truncateString(str: string, maxLength: number): string {
  if (str.length <= maxLength) return str;

  return `${str.slice(0, maxLength)}... [truncated: ${str.length} chars total]`;
}

export function truncateArray(arr: readonly unknown[], options: SanitizeOptions): unknown {
  const nested = { ...options, currentDepth: options.currentDepth + 1 };

  if (arr.length <= options.maxArrayLength) {
    return arr.map((item) => sanitizeForLogging(item, nested));
  }

  return {
    __arrayInfo__: {
      length: arr.length,
      showing: options.maxArrayLength,
      items: arr.slice(0, options.maxArrayLength).map((item) => sanitizeForLogging(item, nested)),
    },
  };
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function truncateObject(obj: Record<string, unknown>, options: SanitizeOptions): Record<string, unknown> {
  if (options.currentDepth >= options.maxDepth) {
    return {
      __keys__: Object.keys(obj),
      __depth__: "max depth exceeded",
    };
  }

  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    if (options.preserveKeys.includes(key)) {
      result[key] = value;
      continue;
    }

    if (options.truncateKeys.includes(key)) {
      if (Array.isArray(value)) {
        result[key] = truncateArray(value, { ...options, maxArrayLength: 1 });
      } else if (isPlainRecord(value)) {
        result[key] = { __keys__: Object.keys(value) };
      } else {
        result[key] = value;
      }
      continue;
    }

    result[key] = sanitizeForLogging(value, {
      ...options,
      currentDepth: options.currentDepth + 1,
    });
  }

  return result;
}

/**
 * Recursively sanitize a value for logging.
 */
export function sanitizeForLogging(value: unknown, options: SanitizeOptions = DEFAULT_SANITIZE_OPTIONS): unknown {
  if (value === null || value === undefined) return value;
  if (typeof value === "boolean" || typeof value === "number") return value;

  if (typeof value === "string") {
    return truncateString(value, options.maxStringLength);
  }

  if (Array.isArray(value)) {
    return truncateArray(value, options);
  }

  if (value instanceof Date) return value.toISOString();
  if (value instanceof Error) {
    return {
      name: value.name,
      message: value.message,
      stack: value.stack ? truncateString(value.stack, options.maxStringLength) : undefined,
    };
  }

  if (isPlainRecord(value)) {
    return truncateObject(value, options);
  }

  return String(value);
}

/**
 * Sanitize a top-level log record. Pino's `formatters.log` hook needs a record back.
 */
export function sanitizeRecord(
  record: Record<string, unknown>,
  options: SanitizeOptions = DEFAULT_SANITIZE_OPTIONS,
): Record<string, unknown> {
  return truncateObject(record, options);
}

function intFromEnv(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export function getSanitizeOptionsFromEnv(): SanitizeOptions {
  return {
    ...DEFAULT_SANITIZE_OPTIONS,
    maxArrayLength: intFromEnv(process.env.LOG_MAX_ARRAY_LENGTH, DEFAULT_SANITIZE_OPTIONS.maxArrayLength),
    maxStringLength: intFromEnv(process.env.LOG_MAX_STRING_LENGTH, DEFAULT_SANITIZE_OPTIONS.maxStringLength),
    maxDepth: intFromEnv(process.env.LOG_MAX_DEPTH, DEFAULT_SANITIZE_OPTIONS.maxDepth),
  };
}
