/**
 * @module @field-advisor/advisor-contracts/types
 * Core data model shared by the classifier, dispatcher and synthesizer.
 */

import type { Category, DomainCategory, LanguageCode } from './constants.js';

/**
 * Loosely typed request context.
 *
 * Well-known keys are typed; anything else the caller sends is preserved
 * and handed to specialists untouched.
 */
export interface QueryContext {
  readonly location?: string;
  readonly state?: string;
  readonly cropType?: string;
  readonly farmerCategory?: string;
  readonly landArea?: number;
  readonly landAreaUnit?: string;
  readonly season?: string;
  readonly [key: string]: unknown;
}

/**
 * Inbound question. Frozen at construction (see `createQuery`).
 */
export interface Query {
  /** Raw question text */
  readonly text: string;
  /** Explicit caller context */
  readonly context: QueryContext;
  /** Requested language; inferred from text when absent */
  readonly language?: LanguageCode;
  /** Fan out to every applicable specialist instead of the best match */
  readonly comprehensive: boolean;
}

export type LanguageSource = 'requested' | 'detected' | 'default';

/**
 * Classifier output. Produced once per query, never mutated.
 */
export interface Classification {
  readonly language: LanguageCode;
  readonly languageSource: LanguageSource;
  /** Always set; `general` when nothing matched */
  readonly primary: Category;
  /** Only populated for comprehensive queries */
  readonly secondary: readonly DomainCategory[];
  /** Keyword hit count per domain category */
  readonly scores: Readonly<Record<DomainCategory, number>>;
  /** Entities inferred from the text alone */
  readonly entities: QueryContext;
  /** Explicit context merged over inferred entities (explicit wins) */
  readonly context: QueryContext;
}

export type RecommendationPriority = 'high' | 'medium' | 'low';

export interface Recommendation {
  readonly text: string;
  readonly priority?: RecommendationPriority;
}

/**
 * Specialist output. Opaque beyond `confidence` and `source`.
 */
export interface SpecialistPayload {
  /** Self-reported confidence in [0, 1] */
  readonly confidence: number;
  /** Human-readable source label, e.g. "Weather Specialist" */
  readonly source: string;
  readonly summary?: string;
  readonly recommendations?: readonly Recommendation[];
  readonly [key: string]: unknown;
}

interface SpecialistResultBase {
  readonly specialistId: string;
  readonly category: DomainCategory;
  readonly durationMs: number;
}

export interface SpecialistSuccess extends SpecialistResultBase {
  readonly outcome: 'success';
  readonly payload: SpecialistPayload;
}

export interface SpecialistFailure extends SpecialistResultBase {
  readonly outcome: 'failure';
  readonly reason: string;
}

export interface SpecialistTimeout extends SpecialistResultBase {
  readonly outcome: 'timeout';
  readonly reason: string;
}

export type SpecialistResult = SpecialistSuccess | SpecialistFailure | SpecialistTimeout;

export type SpecialistOutcome = SpecialistResult['outcome'];

/**
 * A domain handler. Implementations must tolerate being abandoned:
 * when `signal` aborts, the dispatcher has already discarded the call.
 */
export interface Specialist {
  /** Unique id within the registry */
  readonly id: string;
  readonly category: DomainCategory;
  /** Source label used when the specialist fails before producing a payload */
  readonly label: string;
  readonly description: string;
  readonly capabilities: readonly string[];
  /** Overrides the dispatcher's default budget */
  readonly timeoutMs?: number;
  invoke(query: Query, context: QueryContext, signal: AbortSignal): Promise<SpecialistPayload>;
}

export interface PartialFailure {
  readonly category: DomainCategory;
  readonly specialistId: string;
  readonly outcome: Exclude<SpecialistOutcome, 'success'>;
  readonly reason: string;
}

export interface RankedRecommendation extends Recommendation {
  readonly category: DomainCategory;
  readonly source: string;
}

export type SynthesizedData = SpecialistPayload | Readonly<Record<string, SpecialistPayload>> | null;

export interface SynthesizedResponse {
  readonly success: boolean;
  /** Single payload, payloads keyed by category, or null when nothing succeeded */
  readonly data: SynthesizedData;
  /** Unweighted mean of successful confidences; 0 when none succeeded */
  readonly confidence: number;
  readonly sources: readonly string[];
  readonly recommendations: readonly RankedRecommendation[];
  readonly failures: readonly PartialFailure[];
}
