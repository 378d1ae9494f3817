import type { Config } from "../config/schema.js";
import { createLogger } from "../core/logging/logger.js";
import { LinearPipeline } from "../core/pipeline/linear-pipeline.js";
import type { StageRegistry } from "../core/pipeline/registry.js";
import { StreamContext } from "../core/pipeline/stream-context.js";
import type { CombinationPolicy, PipelineRun, Stage } from "../core/pipeline/types.js";
import { createFilterRegistry } from "../steps/filters/index.js";
import { createFileTokenSource } from "../steps/io/read-tokens.js";
import { createCollectingSink, createConsoleSink, createTeeSink } from "../steps/io/write-tokens.js";

const logger = createLogger("token-filter");

type TokenStage = Stage<StreamContext<string>>;

export interface TokenFilterPipelineParts {
  source: TokenStage;
  filters: TokenStage[];
  sink: TokenStage;
  policy?: CombinationPolicy;
  name?: string;
}

/**
 * Assemble source → filters → sink into one pipeline.
 */
export function buildTokenFilterPipeline(parts: TokenFilterPipelineParts): LinearPipeline<StreamContext<string>> {
  const pipeline = new LinearPipeline<StreamContext<string>>({ policy: parts.policy, name: parts.name });

  pipeline.addLink(parts.source);
  for (const filter of parts.filters) {
    pipeline.addLink(filter);
  }
  pipeline.addLink(parts.sink);

  return pipeline;
}

export interface TokenFilterOptions {
  /** Line writer for the console sink; defaults to stdout */
  write?: (line: string) => void;
  /** Registry resolving `pipeline.filters[].kind`; the built-in filters by default */
  registry?: StageRegistry<StreamContext<string>>;
}

export interface TokenFilterResult {
  result: boolean;
  /** Every token that reached the sink, in order */
  tokens: string[];
  run: PipelineRun<StreamContext<string>>;
}

/**
 * Read the configured file, run its tokens through the configured filters and
 * print the survivors.
 *
 * Filter configuration is validated while building, so a bad `kind` or bad
 * options throw here before any stage runs.
 */
export async function runTokenFilter(config: Config, options: TokenFilterOptions = {}): Promise<TokenFilterResult> {
  const { path } = config.source;
  if (!path) {
    throw new Error("No source file configured (set source.path, TOKEN_SOURCE or pass a file argument)");
  }

  const registry = options.registry ?? createFilterRegistry();
  const filters = config.pipeline.filters.map((filter) => registry.create(filter.kind, filter.options));

  const tokens: string[] = [];
  const output = createTeeSink<string>(
    [createConsoleSink<string>({ prefix: config.output.prefix, write: options.write }), createCollectingSink(tokens)],
    "output",
  );

  const pipeline = buildTokenFilterPipeline({
    name: config.pipeline.name,
    policy: config.pipeline.policy,
    source: createFileTokenSource({ path, delimiters: config.source.delimiters }),
    filters,
    sink: output,
  });

  logger.debug({ event: "pipeline_built", pipeline: pipeline.name, stages: pipeline.stageNames() });

  const run = await pipeline.run(new StreamContext<string>());
  return { result: run.result, tokens, run };
}
