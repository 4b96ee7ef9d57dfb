/**
 * @module @field-advisor/progress-reporter/types
 * Type definitions for progress feedback system.
 */

import type {
  Category,
  DomainCategory,
  LanguageCode,
  LanguageSource,
} from '@field-advisor/advisor-contracts';

/**
 * Progress event types.
 */
export type ProgressEventType =
  | 'query_started'
  | 'query_classified'
  | 'specialist_started'
  | 'specialist_completed'
  | 'specialist_failed'
  | 'specialist_timed_out'
  | 'query_completed';

/**
 * Base progress event.
 */
export interface BaseProgressEvent {
  type: ProgressEventType;
  timestamp: number;
}

/**
 * Query started event.
 */
export interface QueryStartedEvent extends BaseProgressEvent {
  type: 'query_started';
  data: {
    text: string;
    comprehensive: boolean;
  };
}

/**
 * Query classified event.
 */
export interface QueryClassifiedEvent extends BaseProgressEvent {
  type: 'query_classified';
  data: {
    language: LanguageCode;
    languageSource: LanguageSource;
    primary: Category;
    secondary: readonly DomainCategory[];
  };
}

/**
 * Specialist lifecycle event.
 */
export interface SpecialistEvent extends BaseProgressEvent {
  type: 'specialist_started' | 'specialist_completed' | 'specialist_failed' | 'specialist_timed_out';
  data: {
    specialistId: string;
    category: DomainCategory;
    durationMs?: number; // Not set for 'started'
    confidence?: number; // Only for 'completed'
    reason?: string; // Only for 'failed' and 'timed_out'
  };
}

/**
 * Query completed event.
 */
export interface QueryCompletedEvent extends BaseProgressEvent {
  type: 'query_completed';
  data: {
    status: 'success' | 'failed';
    totalDuration: number;
    confidence: number;
    sources: readonly string[];
    failureCount: number;
  };
}

/**
 * Union of all progress events.
 */
export type ProgressEvent =
  | QueryStartedEvent
  | QueryClassifiedEvent
  | SpecialistEvent
  | QueryCompletedEvent;

/**
 * Progress callback function.
 */
export type ProgressCallback = (event: ProgressEvent) => void;
