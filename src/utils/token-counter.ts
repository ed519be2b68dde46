/**
 * Approximate token counting for context budgets.
 *
 * Uses a character heuristic (~3.5 chars per token). The answering step only
 * needs a budget that errs on the safe side, not an exact tokenizer count.
 */

export const CHARS_PER_TOKEN = 3.5;

/**
 * Approximate token count for a string.
 * Biased slightly high to avoid over-stuffing the answer context.
 */
export function approximateTokens(text: string): number {
  if (!text) return 0;
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}
