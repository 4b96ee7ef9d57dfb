/**
 * @module @field-advisor/query-classifier/types
 * Type definitions for query classification.
 */

import type {
  Classification,
  ClassifierConfig,
  DomainCategory,
  LanguageCode,
  Query,
} from '@field-advisor/advisor-contracts';

// Re-export for convenience
export type { Classification, ClassifierConfig, Query };

/**
 * Query classifier interface.
 */
export interface IQueryClassifier {
  /**
   * Classify language, category and entities of a query.
   * Pure; never throws for a valid Query.
   */
  classify(query: Query): Classification;
}

/**
 * Script signature for one language. Signatures are checked in list order.
 */
export interface LanguageSignature {
  code: LanguageCode;
  /** Unicode script name, informational */
  script: string;
  /** Inclusive code point range of the script block */
  range: readonly [number, number];
  /**
   * Words that must occur for the signature to match.
   * Separates languages sharing a script (Marathi vs Hindi).
   */
  markers: readonly string[];
}

/**
 * Keyword lists per category and language. English doubles as fallback.
 */
export type CategoryKeywordTable = Readonly<
  Record<DomainCategory, Readonly<Partial<Record<LanguageCode, readonly string[]>>>>
>;

/**
 * Dictionary entry: canonical name plus every spelling that maps to it.
 */
export interface NamedAliases {
  name: string;
  aliases: readonly string[];
}

export interface LocationEntry extends NamedAliases {
  kind: 'city' | 'state';
}

export interface ClassifierTables {
  languageSignatures: readonly LanguageSignature[];
  categoryKeywords: CategoryKeywordTable;
  locations: readonly LocationEntry[];
  crops: readonly NamedAliases[];
  seasons: readonly NamedAliases[];
}
