/**
 * Token Estimation
 */

/** Characters per token for English text */
export const CHARS_PER_TOKEN = 4;

/**
 * Rough token estimate from a string. ~4 chars per token for English.
 * Used for the context budget, not billing.
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}
