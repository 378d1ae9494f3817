import type { StreamContext } from "../../core/pipeline/stream-context.js";
import { StageRegistry } from "../../core/pipeline/registry.js";
import { createMaxLengthFilter, MaxLengthOptionsSchema } from "./max-length.js";
import { createPalindromeFilter, PalindromeOptionsSchema } from "./palindrome.js";
import { createStartsWithFilter, StartsWithOptionsSchema } from "./starts-with.js";

export { createMaxLengthFilter, MaxLengthOptionsSchema, type MaxLengthOptions } from "./max-length.js";
export { createPalindromeFilter, PalindromeOptionsSchema } from "./palindrome.js";
export { createStartsWithFilter, StartsWithOptionsSchema, type StartsWithOptions } from "./starts-with.js";

/**
 * Registry with the built-in token filters:
 * - startsWith { keyword }
 * - maxLength { max }
 * - palindrome {}
 */
export function createFilterRegistry(): StageRegistry<StreamContext<string>> {
  return new StageRegistry<StreamContext<string>>()
    .register("startsWith", {
      description: "Keep tokens starting with a keyword",
      optionsSchema: StartsWithOptionsSchema,
      create: createStartsWithFilter,
    })
    .register("maxLength", {
      description: "Keep tokens no longer than a maximum length",
      optionsSchema: MaxLengthOptionsSchema,
      create: createMaxLengthFilter,
    })
    .register("palindrome", {
      description: "Keep tokens that are palindromes",
      optionsSchema: PalindromeOptionsSchema,
      create: () => createPalindromeFilter(),
    });
}
