/**
 * Mapping between the transport contract and the core types.
 */

import {
  QueryRequestSchema,
  QueryValidationError,
  createQuery,
  formatZodIssues,
  type Query,
  type QueryResponseBody,
  type SynthesizedResponse,
} from '@field-advisor/advisor-contracts';

export type ParseQueryResult = { ok: true; query: Query } | { ok: false; errors: string[] };

/**
 * Validate a request body and build a Query from it.
 */
export function parseQueryRequest(body: unknown): ParseQueryResult {
  const parsed = QueryRequestSchema.safeParse(body);
  if (!parsed.success) {
    return { ok: false, errors: formatZodIssues(parsed.error) };
  }

  const { query: text, context, comprehensive, language } = parsed.data;
  try {
    return { ok: true, query: createQuery({ text, context, comprehensive, language }) };
  } catch (error) {
    if (error instanceof QueryValidationError) {
      return { ok: false, errors: error.issues };
    }
    throw error;
  }
}

/**
 * Serialize a response for the wire.
 */
export function toTransportResponse(
  response: SynthesizedResponse,
  now: Date = new Date(),
): QueryResponseBody {
  return {
    success: response.success,
    data: response.data,
    confidence: response.confidence,
    source: response.sources.join(', '),
    recommendations: response.recommendations.map((recommendation) => ({ ...recommendation })),
    timestamp: now.toISOString(),
    ...(response.failures.length > 0
      ? { failures: response.failures.map((failure) => ({ ...failure })) }
      : {}),
  };
}
