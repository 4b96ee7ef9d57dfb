/**
 * @module @field-advisor/advisor-contracts/constants
 * Fixed vocabularies: categories and supported languages.
 */

/** Domain categories in priority order (used for tie-breaks). */
export const DOMAIN_CATEGORIES = ['weather', 'crop', 'finance'] as const;

export const CATEGORIES = [...DOMAIN_CATEGORIES, 'general'] as const;

export type DomainCategory = (typeof DOMAIN_CATEGORIES)[number];

export type Category = (typeof CATEGORIES)[number];

export const SUPPORTED_LANGUAGES = ['en', 'hi', 'ta', 'te', 'bn', 'mr', 'gu', 'kn', 'ml', 'pa'] as const;

export type LanguageCode = (typeof SUPPORTED_LANGUAGES)[number];

export const DEFAULT_LANGUAGE: LanguageCode = 'en';

export const LANGUAGE_NAMES: Readonly<Record<LanguageCode, string>> = {
  en: 'English',
  hi: 'Hindi',
  ta: 'Tamil',
  te: 'Telugu',
  bn: 'Bengali',
  mr: 'Marathi',
  gu: 'Gujarati',
  kn: 'Kannada',
  ml: 'Malayalam',
  pa: 'Punjabi',
};

export function isSupportedLanguage(value: unknown): value is LanguageCode {
  return typeof value === 'string' && (SUPPORTED_LANGUAGES as readonly string[]).includes(value);
}

export function isDomainCategory(value: unknown): value is DomainCategory {
  return typeof value === 'string' && (DOMAIN_CATEGORIES as readonly string[]).includes(value);
}

// ═══════════════════════════════════════════════════════════════════════════
// Runtime defaults (advisor.yml falls back to these)
// ═══════════════════════════════════════════════════════════════════════════

export const DISPATCH_CONFIG = {
  /** Per-specialist time budget (5s); also the join ceiling */
  timeoutMs: 5_000,
} as const;

export const CLASSIFIER_CONFIG = {
  /** Share of letters that must belong to a script for it to count */
  minScriptDensity: 0.2,
  /** Keyword hits needed for a secondary category */
  inclusionThreshold: 1,
} as const;

export const HISTORY_CONFIG = {
  dir: '.field-advisor/history',
  /** Sessions kept in index.json */
  maxIndexEntries: 500,
} as const;
