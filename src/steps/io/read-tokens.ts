import { z } from "zod";
import { createLogger } from "../../core/logging/logger.js";
import { OriginUnavailableError, toStageError } from "../../core/pipeline/errors.js";
import { createSource } from "../../core/pipeline/stages.js";
import type { StreamContext } from "../../core/pipeline/stream-context.js";
import type { Stage } from "../../core/pipeline/types.js";
import { readTextFile } from "../../lib/file-io.js";
import { DEFAULT_DELIMITERS, tokenize } from "../../lib/tokenizer.js";

const logger = createLogger("read-tokens");

const ReadTokensOptionsSchema = z.object({
  path: z.string().min(1, "path must not be empty"),
  delimiters: z.string().min(1, "at least one delimiter is required").default(DEFAULT_DELIMITERS),
});

type ReadTokensOptions = z.input<typeof ReadTokensOptionsSchema>;

/**
 * Source stage: reads a text file and writes one item per token.
 *
 * A missing or unreadable file is reported as `false` with an
 * ORIGIN_UNAVAILABLE diagnostic; nothing is written downstream.
 *
 * @example
 * ```typescript
 * pipeline.addLink(createFileTokenSource({ path: "./words.txt", delimiters: " ,;" }));
 * ```
 */
export function createFileTokenSource(options: ReadTokensOptions): Stage<StreamContext<string>> {
  const { path, delimiters } = ReadTokensOptionsSchema.parse(options);

  return createSource<string>("readTokens", async (output) => {
    const file = await readTextFile(path);

    if (!file.success) {
      const error = new OriginUnavailableError(file.source, file.code);
      logger.warn({ event: "origin_unavailable", path: file.source, code: file.code, reason: file.reason });
      return { success: false, error: toStageError(error) };
    }

    let count = 0;
    for (const token of tokenize(file.content, delimiters)) {
      output.write(token);
      count++;
    }

    logger.debug({ event: "tokens_read", path, count });
    return { success: true };
  });
}

/**
 * Source stage over text that is already in memory.
 */
export function createTextTokenSource(
  text: string,
  delimiters: string = DEFAULT_DELIMITERS,
  name = "textTokens",
): Stage<StreamContext<string>> {
  return createSource<string>(name, (output) => {
    for (const token of tokenize(text, delimiters)) {
      output.write(token);
    }
  });
}

/**
 * Source stage over a fixed list of items.
 */
export function createArraySource<T>(items: readonly T[], name = "arraySource"): Stage<StreamContext<T>> {
  return createSource<T>(name, (output) => {
    output.writeAll(items);
  });
}

export { ReadTokensOptionsSchema };
export type { ReadTokensOptions };
