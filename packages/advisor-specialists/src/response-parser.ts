/**
 * Splits an LLM answer into a summary and list-item recommendations.
 */

import type { Recommendation, RecommendationPriority } from '@field-advisor/advisor-contracts';

export interface ParsedAdvice {
  summary: string;
  recommendations: Recommendation[];
}

const LIST_ITEM = /^\s*(?:[-*•]|\d+[.)])\s+(.*)$/u;
const PRIORITY_TAG = /^\[(high|medium|low)\]\s*/i;

function toPriority(tag: string): RecommendationPriority {
  const lowered = tag.toLowerCase();
  if (lowered === 'high' || lowered === 'medium') {
    return lowered;
  }
  return 'low';
}

/**
 * Bullet and numbered lines become recommendations; an optional leading
 * `[high]`, `[medium]` or `[low]` tag sets the priority. Everything else,
 * joined by single spaces, is the summary.
 *
 * @example
 * ```typescript
 * parseAdvice('Dry week ahead.\n- [high] Irrigate within 24 hours');
 * // { summary: 'Dry week ahead.',
 * //   recommendations: [{ text: 'Irrigate within 24 hours', priority: 'high' }] }
 * ```
 */
export function parseAdvice(content: string): ParsedAdvice {
  const summaryLines: string[] = [];
  const recommendations: Recommendation[] = [];

  for (const line of content.split(/\r?\n/)) {
    const item = LIST_ITEM.exec(line);
    if (!item) {
      const trimmed = line.trim();
      if (trimmed) {
        summaryLines.push(trimmed);
      }
      continue;
    }

    let text = (item[1] ?? '').trim();
    const tag = PRIORITY_TAG.exec(text);
    if (tag?.[1]) {
      text = text.slice(tag[0].length).trim();
    }
    if (!text) {
      continue;
    }
    recommendations.push(tag?.[1] ? { text, priority: toPriority(tag[1]) } : { text });
  }

  return { summary: summaryLines.join(' '), recommendations };
}
