export { type Config, configSchema, loadConfig } from "./config/schema.js";
export {
  configureLogging,
  createLogger,
  type Logger,
  type LoggingSettings,
  setLogLevel,
} from "./core/logging/logger.js";
export {
  ErrorCodes,
  extractErrorCode,
  OriginUnavailableError,
  PipelineError,
  StageConfigError,
  toStageError,
  UnknownStageKindError,
} from "./core/pipeline/errors.js";
export { LinearPipeline, type LinearPipelineOptions } from "./core/pipeline/linear-pipeline.js";
export { type StageDefinition, StageRegistry } from "./core/pipeline/registry.js";
export {
  createFilter,
  createSink,
  createSource,
  createStage,
  createStreamStage,
  createTransform,
  type StreamTransform,
} from "./core/pipeline/stages.js";
export { StreamContext } from "./core/pipeline/stream-context.js";
export { BufferedStream, type InputStream, type OutputStream } from "./core/pipeline/streams.js";
export type {
  CombinationPolicy,
  PipelineRun,
  Stage,
  StageCapabilities,
  StageError,
  StageKind,
  StageRecord,
  StageResult,
} from "./core/pipeline/types.js";
export { type FileReadResult, readTextFile } from "./lib/file-io.js";
export { isPalindrome, maxLength, startsWith } from "./lib/text-predicates.js";
export { DEFAULT_DELIMITERS, TokenSequence, tokenize } from "./lib/tokenizer.js";
export {
  createFilterRegistry,
  createMaxLengthFilter,
  createPalindromeFilter,
  createStartsWithFilter,
} from "./steps/filters/index.js";
export { createArraySource, createFileTokenSource, createTextTokenSource } from "./steps/io/read-tokens.js";
export { createCollectingSink, createConsoleSink, createTeeSink } from "./steps/io/write-tokens.js";
export { buildTokenFilterPipeline, runTokenFilter } from "./workflows/token-filter.js";
