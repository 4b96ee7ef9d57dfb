/**
 * @module @field-advisor/advisor-orchestrator/synthesizer
 * Folds specialist results into one response. Pure.
 */

import type {
  PartialFailure,
  RankedRecommendation,
  RecommendationPriority,
  SpecialistPayload,
  SpecialistResult,
  SpecialistSuccess,
  SynthesizedData,
  SynthesizedResponse,
} from '@field-advisor/advisor-contracts';

const PRIORITY_RANK: Readonly<Record<RecommendationPriority, number>> = {
  high: 0,
  medium: 1,
  low: 2,
};

const UNSPECIFIED_RANK = 3;

function isSuccess(result: SpecialistResult): result is SpecialistSuccess {
  return result.outcome === 'success';
}

function buildData(successes: readonly SpecialistSuccess[]): SynthesizedData {
  const [only] = successes;
  if (only === undefined) {
    return null;
  }
  if (successes.length === 1) {
    return only.payload;
  }

  // No field-level merging; a second payload in a category gets a qualified key
  const keyed: Record<string, SpecialistPayload> = {};
  for (const { category, specialistId, payload } of successes) {
    const key = category in keyed ? `${category}:${specialistId}` : category;
    keyed[key] = payload;
  }
  return Object.freeze(keyed);
}

/**
 * Ordered by priority (high, medium, low, unspecified), then payload
 * confidence descending, then result order. Case-insensitive duplicate
 * texts keep the first occurrence.
 */
export function rankRecommendations(
  successes: readonly SpecialistSuccess[],
): RankedRecommendation[] {
  const entries = successes.flatMap(({ category, payload }) =>
    (payload.recommendations ?? []).map((recommendation) => ({
      recommendation,
      category,
      source: payload.source,
      confidence: payload.confidence,
    })),
  );

  // Array.prototype.sort is stable, so equal keys keep result order
  entries.sort((a, b) => {
    const rankA = a.recommendation.priority ? PRIORITY_RANK[a.recommendation.priority] : UNSPECIFIED_RANK;
    const rankB = b.recommendation.priority ? PRIORITY_RANK[b.recommendation.priority] : UNSPECIFIED_RANK;
    return rankA - rankB || b.confidence - a.confidence;
  });

  const seen = new Set<string>();
  const ranked: RankedRecommendation[] = [];
  for (const { recommendation, category, source } of entries) {
    const key = recommendation.text.trim().toLowerCase();
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    ranked.push({
      text: recommendation.text,
      ...(recommendation.priority ? { priority: recommendation.priority } : {}),
      category,
      source,
    });
  }
  return ranked;
}

/**
 * Combine dispatch results.
 *
 * @example
 * ```typescript
 * const response = synthesize(results);
 * // response.confidence === mean of successful confidences (0 if none)
 * // response.failures lists every failure/timeout in result order
 * ```
 */
export function synthesize(results: readonly SpecialistResult[]): SynthesizedResponse {
  const successes = results.filter(isSuccess);

  const failures: PartialFailure[] = [];
  for (const result of results) {
    if (result.outcome !== 'success') {
      failures.push({
        category: result.category,
        specialistId: result.specialistId,
        outcome: result.outcome,
        reason: result.reason,
      });
    }
  }

  const confidence =
    successes.length > 0
      ? successes.reduce((sum, { payload }) => sum + payload.confidence, 0) / successes.length
      : 0;

  return Object.freeze({
    success: successes.length > 0,
    data: buildData(successes),
    confidence,
    sources: Object.freeze(successes.map(({ payload }) => payload.source)),
    recommendations: Object.freeze(rankRecommendations(successes)),
    failures: Object.freeze(failures),
  });
}
