const SPECIAL_CHARS = new Set('!?@#$%^&*()');

/**
 * Heuristic complexity: 60% sentence length (saturating at 20 words),
 * 40% special characters (saturating at 5). Rounded to two decimals.
 */
export function scoreComplexity(text: string): number {
  const words = text.split(/\s+/).filter(Boolean).length;
  let special = 0;
  for (const ch of text) {
    if (SPECIAL_CHARS.has(ch)) special++;
  }
  const score = 0.6 * Math.min(words / 20, 1) + 0.4 * Math.min(special / 5, 1);
  return Math.round(score * 100) / 100;
}
