/**
 * @module @field-advisor/query-classifier
 * Language, category and entity classification for farming questions.
 *
 * Rule-based and synchronous: script density picks the language, keyword
 * hits pick the category, dictionaries fill in location, crop, land area
 * and season.
 *
 * @example
 * ```typescript
 * import { createQuery } from '@field-advisor/advisor-contracts';
 * import { HeuristicQueryClassifier } from '@field-advisor/query-classifier';
 *
 * const classifier = new HeuristicQueryClassifier();
 * const result = classifier.classify(
 *   createQuery({ text: 'मेरे गेहूं में कीट लगे हैं', comprehensive: true }),
 * );
 *
 * console.log(result.language); // 'hi'
 * console.log(result.primary);  // 'crop'
 * console.log(result.context);  // { cropType: 'Wheat' }
 * ```
 */

export { HeuristicQueryClassifier } from './heuristic-classifier.js';
export { EntityExtractor, mergeContext } from './entity-extractor.js';
export { detectLanguage } from './language-detector.js';
export { DEFAULT_TABLES, toLanguageSignatures, toLocations } from './keyword-tables.js';
export type { RawLocation, RawSignature } from './keyword-tables.js';
export { createTermMatcher, findFirstEntry } from './term-matcher.js';

export type { LanguageDetection } from './language-detector.js';
export type { MatchMode, TermMatcher } from './term-matcher.js';
export type {
  CategoryKeywordTable,
  ClassifierTables,
  IQueryClassifier,
  LanguageSignature,
  LocationEntry,
  NamedAliases,
} from './types.js';
