/**
 * Token estimates for context budgets.
 * Approximation: ~4 characters per token, which over-counts for plain English prose.
 */

export const CHARS_PER_TOKEN = 4;

export function countTokens(text: string): number {
  if (text.length === 0) return 0;
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

/** Cuts `text` so that `countTokens` of the result never exceeds `maxTokens`. */
export function truncateToTokenBudget(text: string, maxTokens: number): string {
  if (countTokens(text) <= maxTokens) return text;
  if (maxTokens <= 0) return "";

  const targetChars = maxTokens * CHARS_PER_TOKEN;
  if (targetChars <= 3) return text.slice(0, targetChars);
  return `${text.slice(0, targetChars - 3).trimEnd()}...`;
}
