/**
 * Zod schemas for queries and specialist payloads.
 *
 * Queries are validated once at construction and frozen; payloads are
 * validated by the dispatcher before they are accepted as a success.
 */

import { z } from 'zod';
import { SUPPORTED_LANGUAGES } from './constants.js';
import { QueryValidationError } from './errors.js';
import type { Query, QueryContext, SpecialistPayload } from './types.js';

export const MAX_QUERY_LENGTH = 4_000;

/**
 * Transport clients often send snake_case context keys.
 * The camelCase key wins when both are present.
 */
const CONTEXT_KEY_ALIASES: Readonly<Record<string, string>> = {
  crop_type: 'cropType',
  crop: 'cropType',
  farmer_type: 'farmerCategory',
  farmer_category: 'farmerCategory',
  land_area: 'landArea',
  land_area_unit: 'landAreaUnit',
};

function normalizeContextKeys(value: unknown): unknown {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return value;
  }

  const entries = Object.entries(value);
  const normalized: Record<string, unknown> = {};

  for (const [key, entry] of entries) {
    if (!(key in CONTEXT_KEY_ALIASES)) {
      normalized[key] = entry;
    }
  }
  for (const [key, entry] of entries) {
    const target = CONTEXT_KEY_ALIASES[key];
    if (target !== undefined && !(target in normalized)) {
      normalized[target] = entry;
    }
  }

  return normalized;
}

export const QueryContextSchema = z.preprocess(
  normalizeContextKeys,
  z
    .object({
      location: z.string().trim().min(1).optional(),
      state: z.string().trim().min(1).optional(),
      cropType: z.string().trim().min(1).optional(),
      farmerCategory: z.string().trim().min(1).optional(),
      landArea: z.coerce.number().nonnegative().optional(),
      landAreaUnit: z.string().trim().min(1).optional(),
      season: z.string().trim().min(1).optional(),
    })
    .passthrough(),
);

export const QueryInputSchema = z.object({
  text: z.string().trim().min(1, 'Query text is required').max(MAX_QUERY_LENGTH),
  context: QueryContextSchema.optional(),
  language: z.enum(SUPPORTED_LANGUAGES).optional(),
  comprehensive: z.boolean().optional().default(false),
});

export type QueryInput = z.input<typeof QueryInputSchema>;

export const RecommendationSchema = z.object({
  text: z.string().trim().min(1),
  priority: z.enum(['high', 'medium', 'low']).optional(),
});

export const SpecialistPayloadSchema = z
  .object({
    confidence: z.number().min(0).max(1),
    source: z.string().trim().min(1),
    summary: z.string().optional(),
    recommendations: z.array(RecommendationSchema).optional(),
  })
  .passthrough();

/**
 * Flatten zod issues into `path: message` lines.
 */
export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

/**
 * Build an immutable Query.
 *
 * @throws QueryValidationError when the input does not match `QueryInputSchema`
 */
export function createQuery(input: QueryInput): Query {
  const parsed = QueryInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new QueryValidationError(formatZodIssues(parsed.error));
  }

  const explicit: QueryContext = parsed.data.context ?? {};
  let context: QueryContext;
  try {
    context = structuredClone(explicit);
  } catch {
    throw new QueryValidationError(['context: must contain plain data only']);
  }

  const { text, language, comprehensive } = parsed.data;
  const query: Query = language
    ? { text, context, language, comprehensive }
    : { text, context, comprehensive };

  return deepFreeze(query);
}

/**
 * Validate a specialist payload (returns success/issues).
 */
export function validateSpecialistPayload(data: unknown): {
  success: boolean;
  data?: SpecialistPayload;
  issues?: string[];
} {
  const result = SpecialistPayloadSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, issues: formatZodIssues(result.error) };
}
