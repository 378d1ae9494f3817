import { z } from "zod";
import { createFilter } from "../../core/pipeline/stages.js";
import type { StreamContext } from "../../core/pipeline/stream-context.js";
import type { Stage } from "../../core/pipeline/types.js";
import { startsWith } from "../../lib/text-predicates.js";

const StartsWithOptionsSchema = z.object({
  keyword: z.string().min(1, "keyword must not be empty"),
});

type StartsWithOptions = z.infer<typeof StartsWithOptionsSchema>;

/**
 * Filter stage: forwards tokens beginning with `keyword` (case-sensitive).
 */
export function createStartsWithFilter(options: StartsWithOptions): Stage<StreamContext<string>> {
  const { keyword } = StartsWithOptionsSchema.parse(options);
  return createFilter(`startsWith(${keyword})`, startsWith(keyword));
}

export { StartsWithOptionsSchema };
export type { StartsWithOptions };
