/**
 * @module @field-advisor/query-classifier/heuristic-classifier
 * Keyword and script based query classifier.
 *
 * Fast, rule-based classification: no I/O, no LLM. Supports all ten
 * languages through the bundled keyword tables, with English keywords
 * counted for every language.
 */

import {
  DEFAULT_ADVISOR_CONFIG,
  DOMAIN_CATEGORIES,
  isSupportedLanguage,
  type Category,
  type Classification,
  type ClassifierConfig,
  type DomainCategory,
  type LanguageCode,
  type LanguageSource,
  type Query,
} from '@field-advisor/advisor-contracts';
import { EntityExtractor, mergeContext } from './entity-extractor.js';
import { DEFAULT_TABLES } from './keyword-tables.js';
import { detectLanguage } from './language-detector.js';
import { createTermMatcher, type TermMatcher } from './term-matcher.js';
import type { ClassifierTables, IQueryClassifier } from './types.js';

type CompiledKeywords = Record<DomainCategory, Partial<Record<LanguageCode, TermMatcher[]>>>;

function compileKeywords(tables: ClassifierTables): CompiledKeywords {
  const compiled: CompiledKeywords = { weather: {}, crop: {}, finance: {} };
  for (const category of DOMAIN_CATEGORIES) {
    for (const [language, keywords] of Object.entries(tables.categoryKeywords[category])) {
      if (isSupportedLanguage(language) && keywords) {
        compiled[category][language] = keywords.map((keyword) => createTermMatcher(keyword));
      }
    }
  }
  return compiled;
}

/**
 * Heuristic query classifier.
 *
 * @example
 * ```typescript
 * const classifier = new HeuristicQueryClassifier();
 *
 * const result = classifier.classify(createQuery({ text: 'Will it rain in Pune tomorrow?' }));
 * // result.primary === 'weather'
 * // result.language === 'en'
 * // result.context.location === 'Pune'
 * ```
 */
export class HeuristicQueryClassifier implements IQueryClassifier {
  private readonly config: ClassifierConfig;
  private readonly keywords: CompiledKeywords;
  private readonly extractor: EntityExtractor;

  constructor(
    options: Partial<ClassifierConfig> = {},
    private readonly tables: ClassifierTables = DEFAULT_TABLES,
  ) {
    this.config = { ...DEFAULT_ADVISOR_CONFIG.classifier, ...options };
    this.keywords = compileKeywords(tables);
    this.extractor = new EntityExtractor(tables);
  }

  classify(query: Query): Classification {
    const text = query.text.normalize('NFC');
    const { language, languageSource } = this.resolveLanguage(query, text);

    const scores = this.score(text, language);
    const primary = this.pickPrimary(scores);
    const secondary = query.comprehensive ? this.pickSecondary(scores, primary) : [];

    const entities = this.extractor.extract(text);
    const context = mergeContext(query.context, entities);

    return Object.freeze({
      language,
      languageSource,
      primary,
      secondary: Object.freeze(secondary),
      scores: Object.freeze(scores),
      entities: Object.freeze(entities),
      context: Object.freeze(context),
    });
  }

  private resolveLanguage(
    query: Query,
    text: string,
  ): { language: LanguageCode; languageSource: LanguageSource } {
    if (query.language !== undefined && isSupportedLanguage(query.language)) {
      return { language: query.language, languageSource: 'requested' };
    }
    const detection = detectLanguage(text, this.tables.languageSignatures, this.config.minScriptDensity);
    return { language: detection.language, languageSource: detection.source };
  }

  /**
   * Count distinct keywords per category from the language's set plus English.
   */
  private score(text: string, language: LanguageCode): Record<DomainCategory, number> {
    const scores: Record<DomainCategory, number> = { weather: 0, crop: 0, finance: 0 };

    for (const category of DOMAIN_CATEGORIES) {
      const table = this.keywords[category];
      const matchers = language === 'en' ? (table.en ?? []) : [...(table[language] ?? []), ...(table.en ?? [])];
      const hits = new Set<string>();

      for (const matcher of matchers) {
        if (!hits.has(matcher.term.toLowerCase()) && matcher.indexIn(text) >= 0) {
          hits.add(matcher.term.toLowerCase());
        }
      }
      scores[category] = hits.size;
    }

    return scores;
  }

  private pickPrimary(scores: Record<DomainCategory, number>): Category {
    let primary: Category = 'general';
    let best = 0;
    // Strict comparison keeps the earlier category on ties
    for (const category of DOMAIN_CATEGORIES) {
      if (scores[category] > best) {
        best = scores[category];
        primary = category;
      }
    }
    return primary;
  }

  private pickSecondary(scores: Record<DomainCategory, number>, primary: Category): DomainCategory[] {
    return DOMAIN_CATEGORIES.filter(
      (category) => category !== primary && scores[category] >= this.config.inclusionThreshold,
    ).sort((a, b) => scores[b] - scores[a] || DOMAIN_CATEGORIES.indexOf(a) - DOMAIN_CATEGORIES.indexOf(b));
  }
}
