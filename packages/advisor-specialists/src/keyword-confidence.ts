/**
 * Keyword-share confidence for the reference specialists.
 */

const NEUTRAL_CONFIDENCE = 0.5;

function normalize(value: string): string {
  return value.normalize('NFC').toLowerCase();
}

/**
 * Share of `keywords` that occur in `text` (case-insensitive substring
 * match), capped at 1. A specialist without keywords scores 0.5.
 *
 * @example
 * ```typescript
 * keywordConfidence(['rain', 'irrigation', 'humidity', 'forecast'], 'Rain forecast for Pune');
 * // 0.5
 * ```
 */
export function keywordConfidence(keywords: readonly string[], text: string): number {
  if (keywords.length === 0) {
    return NEUTRAL_CONFIDENCE;
  }

  const haystack = normalize(text);
  const matches = keywords.filter((keyword) => haystack.includes(normalize(keyword))).length;
  return Math.min(matches / keywords.length, 1);
}
