/**
 * Term matching across scripts.
 *
 * Latin terms are matched case-insensitively at a word start ('rain' does
 * not match 'train'); `word` mode also requires a word end. Terms in other
 * scripts are matched as plain substrings, since `\b` is meaningless there.
 */

const LATIN_TERM = /^[\p{Script=Latin}\p{N}\s'.-]+$/u;

export type MatchMode = 'prefix' | 'word';

export interface TermMatcher {
  readonly term: string;
  /** Index of the first occurrence in `text`, or -1 */
  indexIn(text: string): number;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function createTermMatcher(term: string, mode: MatchMode = 'prefix'): TermMatcher {
  const normalized = term.normalize('NFC').trim();

  if (LATIN_TERM.test(normalized)) {
    const tail = mode === 'word' ? '(?![\\p{L}\\p{N}])' : '';
    const pattern = new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(normalized)}${tail}`, 'iu');
    return {
      term: normalized,
      indexIn: (text) => pattern.exec(text)?.index ?? -1,
    };
  }

  return {
    term: normalized,
    indexIn: (text) => text.indexOf(normalized),
  };
}

/**
 * Find the earliest match among named entries; a longer alias wins at the
 * same position ("daman and diu" over "daman").
 */
export function findFirstEntry<T>(
  text: string,
  entries: readonly { entry: T; matcher: TermMatcher }[],
): T | undefined {
  let best: { entry: T; index: number; length: number } | undefined;

  for (const { entry, matcher } of entries) {
    const index = matcher.indexIn(text);
    if (index < 0) {
      continue;
    }
    if (
      best === undefined ||
      index < best.index ||
      (index === best.index && matcher.term.length > best.length)
    ) {
      best = { entry, index, length: matcher.term.length };
    }
  }

  return best?.entry;
}
