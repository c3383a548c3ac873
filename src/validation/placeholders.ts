/**
 * Patterns that mark generated text as a stand-in for a real entity
 * ("Company A", "[COMPANY_NAME]", "{{ticker}}" ...). Bare symbols are left
 * alone: single letters and "XYZ" are listed tickers. None carries the `g`
 * flag: `test()` on a global regex is stateful.
 */
export const DEFAULT_PLACEHOLDER_PATTERNS: readonly RegExp[] = Object.freeze([
  /\b(?:[Cc]ompany|[Ss]tock|[Ff]irm)\s+[A-Z]\b/,
  /\bXYZ\s+(?:Corp(?:oration)?|Inc|Company)\b/,
  /\bACME\b/i,
  /\[[A-Z][A-Z0-9_ ]*\]/,
  /\{\{[^}]*\}\}/,
  /<[A-Z][A-Z0-9_]*>/,
  /\bTBD\b/,
  /\blorem ipsum\b/i,
  /\bplaceholder\b/i,
]);

export function matchPlaceholder(text: string, patterns: readonly RegExp[]): RegExp | undefined {
  return patterns.find((p) => p.test(text));
}
