import { z } from "zod";
import { createFilter } from "../../core/pipeline/stages.js";
import type { StreamContext } from "../../core/pipeline/stream-context.js";
import type { Stage } from "../../core/pipeline/types.js";
import { isPalindrome } from "../../lib/text-predicates.js";

const PalindromeOptionsSchema = z.object({}).strict();

/**
 * Filter stage: forwards tokens that read the same backward (case-sensitive).
 */
export function createPalindromeFilter(): Stage<StreamContext<string>> {
  return createFilter("palindrome", isPalindrome);
}

export { PalindromeOptionsSchema };
