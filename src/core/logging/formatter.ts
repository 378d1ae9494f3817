/**
 * Custom log formatters for compact, readable output on a terminal.
 *
 * - compact: single line with every field
 * - hybrid: event on the first line, fields indented on the second
 * - minimal: seconds-only timestamp and event, no level or component
 */

export type LogFormat = "compact" | "hybrid" | "minimal";

export interface LogObject {
  level: number;
  time: number | string;
  msg?: string;
  component?: string;
  event?: string;
  [key: string]: unknown;
}

const colors = {
  dim: "\x1b[2m",
  cyan: "\x1b[36m",
  yellow: "\x1b[33m",
  green: "\x1b[32m",
  blue: "\x1b[34m",
  red: "\x1b[31m",
  reset: "\x1b[0m",
};

const levelNames: Record<number, string> = {
  10: "TRACE",
  20: "DEBUG",
  30: "INFO",
  40: "WARN",
  50: "ERROR",
  60: "FATAL",
};

const levelColors: Record<number, string> = {
  10: colors.dim,
  20: colors.blue,
  30: colors.green,
  40: colors.yellow,
  50: colors.red,
  60: colors.red,
};

function formatTime(time: number | string): string {
  return new Date(time).toISOString().substring(11, 23); // HH:MM:SS.mmm
}

function formatTimeMinimal(time: number | string): string {
  return new Date(time).toISOString().substring(17, 23); // SS.mmm
}

function formatValue(value: unknown): string {
  if (typeof value === "object" && value !== null) {
    return JSON.stringify(value);
  }
  return String(value);
}

function formatLevel(level: number): string {
  const name = (levelNames[level] || "UNKNOWN").padEnd(5);
  const color = levelColors[level] || colors.dim;
  return `${color}${name}${colors.reset}`;
}

function formatPairs(data: Record<string, unknown>): string[] {
  return Object.entries(data).map(
    ([key, value]) => `${colors.yellow}${key}${colors.reset}=${colors.green}${formatValue(value)}${colors.reset}`,
  );
}

/**
 * Format: TIME LEVEL [component] event key=value ...
 */
export function formatCompact(log: LogObject): string {
  const { level, time, msg, component, event, ...data } = log;

  const pairs = formatPairs(data);
  const label = event || msg;
  const eventStr = label ? `${colors.cyan}${label}${colors.reset}` : "";
  const details = pairs.length > 0 ? ` ${pairs.join(" ")}` : "";

  return `${colors.dim}${formatTime(time)}${colors.reset} ${formatLevel(level)} ${colors.dim}[${component || "app"}]${colors.reset} ${eventStr}${details}`;
}

/**
 * Line 1: TIME LEVEL [component] event
 * Line 2:   key=value ...
 */
export function formatHybrid(log: LogObject): string {
  const { level, time, msg, component, event, ...data } = log;

  const firstLine = `${colors.dim}${formatTime(time)}${colors.reset} ${formatLevel(level)} ${colors.dim}[${component || "app"}]${colors.reset} ${colors.cyan}${event || msg || ""}${colors.reset}`;

  const pairs = formatPairs(data);
  if (pairs.length === 0) {
    return firstLine;
  }

  return `${firstLine}\n  ${pairs.join(" ")}`;
}

/**
 * Format: SS.mmm event key=value ...
 */
export function formatMinimal(log: LogObject): string {
  const { level: _level, time, msg, component: _component, event, ...data } = log;

  const pairs = formatPairs(data);
  const label = event || msg;
  const eventStr = label ? `${colors.cyan}${label}${colors.reset}` : "";
  const details = pairs.length > 0 ? ` ${pairs.join(" ")}` : "";

  return `${colors.dim}${formatTimeMinimal(time)}${colors.reset} ${eventStr}${details}`;
}

export function getFormatter(format: LogFormat): (log: LogObject) => string {
  switch (format) {
    case "hybrid":
      return formatHybrid;
    case "minimal":
      return formatMinimal;
    default:
      return formatCompact;
  }
}

const pinoLevels: Record<string, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
  silent: Number.POSITIVE_INFINITY,
};

function isLogObject(value: unknown): value is LogObject {
  return (
    typeof value === "object" &&
    value !== null &&
    "level" in value &&
    typeof value.level === "number" &&
    "time" in value &&
    (typeof value.time === "number" || typeof value.time === "string")
  );
}

export interface FormatterStreamOptions {
  /** Where formatted lines go (defaults to stderr) */
  write?: (line: string) => void;
}

/**
 * Create a Pino destination that formats each JSON line with one of the formatters above.
 * LOG_LEVEL is re-read on every write so tests can silence output after loggers exist.
 */
export function createFormatterStream(format: LogFormat, options: FormatterStreamOptions = {}) {
  const formatter = getFormatter(format);
  const write = options.write ?? ((line: string) => process.stderr.write(line));

  return {
    write(chunk: string) {
      let parsed: unknown;
      try {
        parsed = JSON.parse(chunk);
      } catch {
        write(chunk);
        return;
      }

      if (!isLogObject(parsed)) {
        write(chunk);
        return;
      }

      const configuredLevel = process.env.LOG_LEVEL || "info";
      const threshold = pinoLevels[configuredLevel] ?? 30;
      if (parsed.level < threshold) {
        return;
      }

      write(`${formatter(parsed)}\n`);
    },
  };
}
