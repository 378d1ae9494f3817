import { readFile } from "node:fs/promises";
import { z } from "zod";
import { DEFAULT_DELIMITERS } from "../lib/tokenizer.js";

export const configSchema = z.object({
  source: z
    .object({
      path: z.string().optional(),
      delimiters: z.string().min(1).default(DEFAULT_DELIMITERS),
    })
    .default({ delimiters: DEFAULT_DELIMITERS }),

  pipeline: z
    .object({
      name: z.string().default("token-filter"),
      policy: z.enum(["and", "or"]).default("and"),
      filters: z
        .array(
          z.object({
            kind: z.string(),
            options: z.record(z.unknown()).default({}),
          }),
        )
        .default([]),
    })
    .default({ name: "token-filter", policy: "and", filters: [] }),

  output: z
    .object({
      prefix: z.string().default(""),
    })
    .default({ prefix: "" }),

  logging: z
    .object({
      level: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("warn"),
      sanitize: z.boolean().default(true),
      maxArrayLength: z.number().int().nonnegative().default(3),
      maxStringLength: z.number().int().nonnegative().default(500),
      maxDepth: z.number().int().nonnegative().default(3),
    })
    .default({
      level: "warn",
      sanitize: true,
      maxArrayLength: 3,
      maxStringLength: 500,
      maxDepth: 3,
    }),
});

export type Config = z.infer<typeof configSchema>;

export const DEFAULT_CONFIG_FILE = "./token-pipeline.json";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(config: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = config[key];
  return isRecord(value) ? value : {};
}

/**
 * Read a JSON config file. A file the caller named must exist and hold a JSON object;
 * the default file may be missing or malformed, in which case defaults and env apply.
 */
async function readConfigFile(path: string, required: boolean): Promise<Record<string, unknown>> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(path, "utf8"));
  } catch (error) {
    if (!required) return {};
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to load configuration: cannot read ${path}: ${reason}`, { cause: error });
  }

  if (isRecord(parsed)) return parsed;
  if (!required) return {};
  throw new Error(`Failed to load configuration: ${path} does not contain a JSON object`);
}

/**
 * Load configuration from file and environment variables.
 *
 * Priority (higher overrides lower):
 * 1. Environment variables
 * 2. Config file given by `path`
 * 3. Config file at CONFIG_FILE
 * 4. ./token-pipeline.json
 * 5. Schema defaults
 *
 * Only ./token-pipeline.json is optional; a file named by `path` or CONFIG_FILE must load.
 */
export async function loadConfig(path?: string): Promise<Config> {
  const namedPath = path || process.env.CONFIG_FILE || undefined;
  const fileConfig = await readConfigFile(namedPath ?? DEFAULT_CONFIG_FILE, namedPath !== undefined);

  const envConfig: Record<string, unknown> = {};

  if (process.env.TOKEN_SOURCE || process.env.TOKEN_DELIMITERS) {
    envConfig.source = {
      ...section(fileConfig, "source"),
      ...(process.env.TOKEN_SOURCE ? { path: process.env.TOKEN_SOURCE } : {}),
      ...(process.env.TOKEN_DELIMITERS ? { delimiters: process.env.TOKEN_DELIMITERS } : {}),
    };
  }

  if (process.env.PIPELINE_POLICY || process.env.PIPELINE_NAME) {
    envConfig.pipeline = {
      ...section(fileConfig, "pipeline"),
      ...(process.env.PIPELINE_POLICY ? { policy: process.env.PIPELINE_POLICY.toLowerCase() } : {}),
      ...(process.env.PIPELINE_NAME ? { name: process.env.PIPELINE_NAME } : {}),
    };
  }

  if (
    process.env.LOG_LEVEL ||
    process.env.LOG_SANITIZE ||
    process.env.LOG_MAX_ARRAY_LENGTH ||
    process.env.LOG_MAX_STRING_LENGTH ||
    process.env.LOG_MAX_DEPTH
  ) {
    envConfig.logging = {
      ...section(fileConfig, "logging"),
      ...(process.env.LOG_LEVEL ? { level: process.env.LOG_LEVEL } : {}),
      ...(process.env.LOG_SANITIZE ? { sanitize: process.env.LOG_SANITIZE !== "false" } : {}),
      ...(process.env.LOG_MAX_ARRAY_LENGTH
        ? { maxArrayLength: Number.parseInt(process.env.LOG_MAX_ARRAY_LENGTH, 10) }
        : {}),
      ...(process.env.LOG_MAX_STRING_LENGTH
        ? { maxStringLength: Number.parseInt(process.env.LOG_MAX_STRING_LENGTH, 10) }
        : {}),
      ...(process.env.LOG_MAX_DEPTH ? { maxDepth: Number.parseInt(process.env.LOG_MAX_DEPTH, 10) } : {}),
    };
  }

  const mergedConfig = { ...fileConfig, ...envConfig };

  const parsed = configSchema.safeParse(mergedConfig);
  if (!parsed.success) {
    throw new Error(`Failed to load configuration: ${parsed.error.message}`);
  }
  return parsed.data;
}
