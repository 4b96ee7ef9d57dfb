/**
 * @module @field-advisor/advisor-orchestrator/history-types
 * Types for query history tracking.
 *
 * Enables:
 * - Replay of a past query with its classification
 * - Comparing responses across runs
 * - Debugging specialist behavior
 */

import { z } from 'zod';
import {
  CATEGORIES,
  DOMAIN_CATEGORIES,
  PartialFailureSchema,
  QueryContextSchema,
  RankedRecommendationSchema,
  SpecialistPayloadSchema,
  SUPPORTED_LANGUAGES,
  type Classification,
  type Query,
  type SynthesizedResponse,
} from '@field-advisor/advisor-contracts';

/**
 * One handled query.
 */
export interface AdvisoryHistory {
  /** Unique session ID */
  sessionId: string;
  query: Query;
  classification: Classification;
  response: SynthesizedResponse;
  /** Session start timestamp */
  startTime: number;
  /** Session end timestamp */
  endTime: number;
  /** Total duration in milliseconds */
  durationMs: number;
  success: boolean;
  /** Error message when the run failed internally */
  error?: string;
}

/**
 * Session metadata for index.json.
 */
export interface SessionMetadata {
  sessionId: string;
  text: string;
  primary: string;
  language: string;
  success: boolean;
  confidence: number;
  durationMs: number;
  timestamp: number;
  sources: string[];
}

export const SessionMetadataSchema = z.object({
  sessionId: z.string(),
  text: z.string(),
  primary: z.string(),
  language: z.string(),
  success: z.boolean(),
  confidence: z.number(),
  durationMs: z.number(),
  timestamp: z.number(),
  sources: z.array(z.string()),
});

/**
 * Shape check for session.json on load.
 */
export const AdvisoryHistorySchema = z.object({
  sessionId: z.string(),
  query: z.object({
    text: z.string(),
    context: QueryContextSchema,
    language: z.enum(SUPPORTED_LANGUAGES).optional(),
    comprehensive: z.boolean(),
  }),
  classification: z.object({
    language: z.enum(SUPPORTED_LANGUAGES),
    languageSource: z.enum(['requested', 'detected', 'default']),
    primary: z.enum(CATEGORIES),
    secondary: z.array(z.enum(DOMAIN_CATEGORIES)),
    scores: z.object({ weather: z.number(), crop: z.number(), finance: z.number() }),
    entities: QueryContextSchema,
    context: QueryContextSchema,
  }),
  response: z.object({
    success: z.boolean(),
    data: z.union([SpecialistPayloadSchema, z.record(SpecialistPayloadSchema), z.null()]),
    confidence: z.number(),
    sources: z.array(z.string()),
    recommendations: z.array(RankedRecommendationSchema),
    failures: z.array(PartialFailureSchema),
  }),
  startTime: z.number(),
  endTime: z.number(),
  durationMs: z.number(),
  success: z.boolean(),
  error: z.string().optional(),
});

/**
 * History storage interface.
 */
export interface IHistoryStorage {
  /**
   * Save a handled query to storage.
   */
  save(history: AdvisoryHistory): Promise<void>;

  /**
   * Load history by session ID.
   */
  load(sessionId: string): Promise<AdvisoryHistory | null>;

  /**
   * List all session IDs, most recent first.
   */
  list(): Promise<string[]>;

  /**
   * Delete history for a session.
   */
  delete(sessionId: string): Promise<void>;
}
