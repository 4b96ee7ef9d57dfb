/**
 * Transport API Schemas
 *
 * Zod schemas for the query request body and the serialized response.
 * No server ships with this package; any HTTP layer maps onto these.
 */

import { z } from 'zod';
import { DOMAIN_CATEGORIES, SUPPORTED_LANGUAGES } from './constants.js';
import { MAX_QUERY_LENGTH, QueryContextSchema, RecommendationSchema } from './query-schemas.js';

/**
 * Request to ask a question
 */
export const QueryRequestSchema = z.object({
  /** Question text */
  query: z.string().trim().min(1, 'Query text is required').max(MAX_QUERY_LENGTH),
  /** Optional key/value context (location, cropType, ...) */
  context: QueryContextSchema.optional(),
  /** Fan out to all applicable specialists */
  comprehensive: z.boolean().optional().default(false),
  /** Language override */
  language: z.enum(SUPPORTED_LANGUAGES).optional(),
});

export type QueryRequest = z.input<typeof QueryRequestSchema>;

/**
 * Partial failure entry
 */
export const PartialFailureSchema = z.object({
  category: z.enum(DOMAIN_CATEGORIES),
  specialistId: z.string(),
  outcome: z.enum(['failure', 'timeout']),
  reason: z.string(),
});

/**
 * Recommendation tagged with the specialist that made it
 */
export const RankedRecommendationSchema = RecommendationSchema.extend({
  category: z.enum(DOMAIN_CATEGORIES),
  source: z.string(),
});

/**
 * Response body
 */
export const QueryResponseBodySchema = z.object({
  success: z.boolean(),
  data: z.unknown(),
  confidence: z.number().min(0).max(1),
  /** Source labels joined with ", " */
  source: z.string(),
  recommendations: z.array(RankedRecommendationSchema),
  timestamp: z.string(),
  /** Present only when non-empty */
  failures: z.array(PartialFailureSchema).optional(),
});

export type QueryResponseBody = z.output<typeof QueryResponseBodySchema>;
