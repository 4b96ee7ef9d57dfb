/**
 * @module @field-advisor/query-classifier/language-detector
 * Script-density language detection.
 */

import { DEFAULT_LANGUAGE, type LanguageCode } from '@field-advisor/advisor-contracts';
import type { LanguageSignature } from './types.js';

const LETTER = /[\p{L}\p{M}]/u;

export interface LanguageDetection {
  language: LanguageCode;
  source: 'detected' | 'default';
  /** Script density of the winning signature (0 for the default) */
  density: number;
}

/**
 * Detect the language of `text`.
 *
 * Walks `signatures` in order; the first whose script covers at least
 * `minScriptDensity` of the letters, and whose markers (if any) occur,
 * wins. No match falls back to English.
 */
export function detectLanguage(
  text: string,
  signatures: readonly LanguageSignature[],
  minScriptDensity: number,
): LanguageDetection {
  const normalized = text.normalize('NFC');
  const codePoints: number[] = [];

  for (const char of normalized) {
    if (LETTER.test(char)) {
      const codePoint = char.codePointAt(0);
      if (codePoint !== undefined) {
        codePoints.push(codePoint);
      }
    }
  }

  if (codePoints.length === 0) {
    return { language: DEFAULT_LANGUAGE, source: 'default', density: 0 };
  }

  for (const signature of signatures) {
    const [start, end] = signature.range;
    const inScript = codePoints.filter((cp) => cp >= start && cp <= end).length;
    const density = inScript / codePoints.length;

    if (density < minScriptDensity) {
      continue;
    }
    if (
      signature.markers.length > 0 &&
      !signature.markers.some((marker) => normalized.includes(marker.normalize('NFC')))
    ) {
      continue;
    }

    return { language: signature.code, source: 'detected', density };
  }

  return { language: DEFAULT_LANGUAGE, source: 'default', density: 0 };
}
