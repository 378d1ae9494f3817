import { parseArgs } from "node:util";
import { type Config, loadConfig } from "../config/schema.js";
import { configureLogging, createLogger } from "../core/logging/logger.js";
import { PipelineError } from "../core/pipeline/errors.js";
import type { CombinationPolicy } from "../core/pipeline/types.js";
import { runTokenFilter } from "../workflows/token-filter.js";

const logger = createLogger("cli");

export const ExitCodes = {
  ACCEPTED: 0,
  REJECTED: 1,
  USAGE: 2,
} as const;

export interface CLIIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

const defaultIO: CLIIO = {
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`),
};

const cliOptions = {
  config: { type: "string", short: "c" },
  policy: { type: "string", short: "p" },
  "starts-with": { type: "string", short: "s" },
  "max-length": { type: "string", short: "m" },
  palindrome: { type: "boolean", default: false },
  delimiters: { type: "string", short: "d" },
  prefix: { type: "string" },
  verbose: { type: "boolean", short: "v", default: false },
  help: { type: "boolean", short: "h", default: false },
} as const;

function parseCLIArgs(argv: string[]) {
  return parseArgs({ args: argv, options: cliOptions, allowPositionals: true });
}

type ParsedValues = ReturnType<typeof parseCLIArgs>["values"];

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function filtersFromFlags(values: ParsedValues): Config["pipeline"]["filters"] | undefined {
  const filters: Config["pipeline"]["filters"] = [];

  const keyword = values["starts-with"];
  if (keyword !== undefined) {
    filters.push({ kind: "startsWith", options: { keyword } });
  }

  const max = values["max-length"];
  if (max !== undefined) {
    if (!/^\d+$/.test(max)) {
      throw new UsageError(`--max-length expects a non-negative integer, got "${max}"`);
    }
    filters.push({ kind: "maxLength", options: { max: Number.parseInt(max, 10) } });
  }

  if (values.palindrome) {
    filters.push({ kind: "palindrome", options: {} });
  }

  return filters.length > 0 ? filters : undefined;
}

function parsePolicy(value: string | undefined): CombinationPolicy | undefined {
  if (value === undefined) return undefined;

  const policy = value.toLowerCase();
  if (policy === "and" || policy === "or") {
    return policy;
  }
  throw new UsageError(`--policy must be "and" or "or", got "${value}"`);
}

function applyFlags(config: Config, values: ParsedValues, positionals: string[]): Config {
  const policy = parsePolicy(values.policy);
  if (positionals.length > 1) {
    throw new UsageError(`Expected at most one file, got ${positionals.length}`);
  }

  return {
    ...config,
    source: {
      ...config.source,
      ...(positionals[0] !== undefined ? { path: positionals[0] } : {}),
      ...(values.delimiters ? { delimiters: values.delimiters } : {}),
    },
    pipeline: {
      ...config.pipeline,
      ...(policy !== undefined ? { policy } : {}),
      filters: filtersFromFlags(values) ?? config.pipeline.filters,
    },
    output: {
      ...config.output,
      ...(values.prefix !== undefined ? { prefix: values.prefix } : {}),
    },
  };
}

const HELP = `
token-pipeline - run text tokens through a chain of filters

USAGE:
  token-pipeline [OPTIONS] [FILE]

OPTIONS:
  -c, --config <path>       Config file (default: ./token-pipeline.json or CONFIG_FILE)
  -p, --policy <and|or>     How stage results combine (default: and)
  -s, --starts-with <kw>    Keep tokens starting with <kw>
  -m, --max-length <n>      Keep tokens of at most <n> characters
      --palindrome          Keep palindromes
  -d, --delimiters <chars>  Characters that separate tokens
      --prefix <text>       Prepended to every printed token
  -v, --verbose             Debug logging on stderr
  -h, --help                Show this help message

Filter flags replace the filters from the config file and run in the order
starts-with, max-length, palindrome.

EXIT CODES:
  0  pipeline accepted
  1  pipeline rejected (a stage failed or rejected)
  2  usage or configuration error

ENVIRONMENT VARIABLES:
  TOKEN_SOURCE        File to read
  TOKEN_DELIMITERS    Token delimiters
  PIPELINE_POLICY     and | or
  PIPELINE_NAME       Name used in logs
  CONFIG_FILE         Path to the config file
  LOG_LEVEL           Logging level (default: warn; info, debug, silent, ...)
  LOG_FORMAT          compact | hybrid | minimal | pretty
  LOG_SANITIZE        false to log token lists in full
`.trim();

/**
 * Run the command line. Returns the process exit code instead of exiting.
 */
export async function runCLI(argv: string[], io: CLIIO = defaultIO): Promise<number> {
  try {
    const { values, positionals } = parseCLIArgs(argv);

    if (values.help) {
      io.stdout(HELP);
      return ExitCodes.ACCEPTED;
    }

    const config = applyFlags(await loadConfig(values.config), values, positionals);
    configureLogging({
      ...config.logging,
      level: values.verbose ? "debug" : config.logging.level,
    });
    logger.debug({
      event: "config_loaded",
      source: config.source.path,
      policy: config.pipeline.policy,
      filters: config.pipeline.filters.map((filter) => filter.kind),
    });

    const outcome = await runTokenFilter(config, { write: io.stdout });
    return outcome.result ? ExitCodes.ACCEPTED : ExitCodes.REJECTED;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error({
      event: "cli_error",
      code: error instanceof PipelineError ? error.code : undefined,
      error: message,
    });
    io.stderr(`Error: ${message}`);
    if (!(error instanceof UsageError || error instanceof PipelineError)) {
      io.stderr("Run with --help for usage.");
    }
    return ExitCodes.USAGE;
  }
}
