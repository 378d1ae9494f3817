import pino from "pino";
import { createFormatterStream, type LogFormat } from "./formatter.js";
import { DEFAULT_SANITIZE_OPTIONS, getSanitizeOptionsFromEnv, sanitizeRecord } from "./sanitizer.js";

/**
 * Structured logging with Pino.
 *
 * - JSON output in production for machine parsing
 * - Compact, readable formats for development (via LOG_FORMAT)
 * - Everything goes to stderr; stdout belongs to the sink stages
 * - Long token lists are truncated by the sanitizer
 */

const isDev = process.env.NODE_ENV !== "production";
let sanitizeEnabled = process.env.LOG_SANITIZE !== "false";
let sanitizeOptions = getSanitizeOptionsFromEnv();

function resolveFormat(value: string | undefined): LogFormat | "pretty" {
  switch (value) {
    case "hybrid":
    case "minimal":
    case "pretty":
      return value;
    default:
      return "compact";
  }
}

const logFormat = resolveFormat(process.env.LOG_FORMAT);

const baseConfig: pino.LoggerOptions = {
  level: process.env.LOG_LEVEL || "info",
  messageKey: "msg",
  timestamp: pino.stdTimeFunctions.isoTime,

  // Service metadata only in production JSON logs
  base: isDev
    ? null
    : {
        service: "token-pipeline",
        version: process.env.npm_package_version || "0.0.0",
        pid: process.pid,
      },

  serializers: {
    err: pino.stdSerializers.err,
  },

  formatters: {
    log(obj: Record<string, unknown>) {
      if (!sanitizeEnabled) return obj;
      return sanitizeRecord(obj, sanitizeOptions);
    },
  },
};

const baseLogger = isDev
  ? logFormat === "pretty"
    ? pino({
        ...baseConfig,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            destination: 2,
            translateTime: "HH:MM:ss.l",
            ignore: "pid,hostname",
          },
        },
      })
    : pino(baseConfig, createFormatterStream(logFormat))
  : pino(baseConfig, pino.destination(2));

export interface LogContext {
  traceId?: string;
  pipeline?: string;
  [key: string]: unknown;
}

export type Logger = pino.Logger;

// Component loggers are created at module load; level changes must reach them too
const componentLoggers = new Set<Logger>();

export function createLogger(component: string, context?: LogContext): Logger {
  const child = baseLogger.child({
    component,
    ...context,
  });
  componentLoggers.add(child);
  return child;
}

export { baseLogger as logger };

export function withTraceContext(logger: Logger, traceId: string, pipeline?: string): Logger {
  return logger.child({ traceId, pipeline });
}

/**
 * Set the level of the base logger and of every component logger.
 * Loggers derived later (trace contexts) inherit it when they are created.
 */
export function setLogLevel(level: pino.LevelWithSilent): void {
  baseLogger.level = level;
  for (const child of componentLoggers) {
    child.level = level;
  }
  process.env.LOG_LEVEL = level;
}

export interface LoggingSettings {
  level: pino.LevelWithSilent;
  sanitize: boolean;
  maxArrayLength: number;
  maxStringLength: number;
  maxDepth: number;
}

/**
 * Apply the `logging` section of a loaded config. The output format is fixed
 * when the base logger is built, so it is read from LOG_FORMAT only.
 */
export function configureLogging(settings: LoggingSettings): void {
  sanitizeEnabled = settings.sanitize;
  sanitizeOptions = {
    ...DEFAULT_SANITIZE_OPTIONS,
    maxArrayLength: settings.maxArrayLength,
    maxStringLength: settings.maxStringLength,
    maxDepth: settings.maxDepth,
  };
  setLogLevel(settings.level);
}
