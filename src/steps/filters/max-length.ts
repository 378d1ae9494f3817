import { z } from "zod";
import { createFilter } from "../../core/pipeline/stages.js";
import type { StreamContext } from "../../core/pipeline/stream-context.js";
import type { Stage } from "../../core/pipeline/types.js";
import { maxLength } from "../../lib/text-predicates.js";

const MaxLengthOptionsSchema = z.object({
  max: z.number().int().nonnegative(),
});

type MaxLengthOptions = z.infer<typeof MaxLengthOptionsSchema>;

/**
 * Filter stage: forwards tokens no longer than `max` characters.
 */
export function createMaxLengthFilter(options: MaxLengthOptions): Stage<StreamContext<string>> {
  const { max } = MaxLengthOptionsSchema.parse(options);
  return createFilter(`maxLength(${max})`, maxLength(max));
}

export { MaxLengthOptionsSchema };
export type { MaxLengthOptions };
