/**
 * Bundled keyword and dictionary tables.
 *
 * Loaded and checked once at module load; a malformed table is a
 * ConfigurationError at startup, never at request time.
 */

import { ConfigurationError, isSupportedLanguage } from '@field-advisor/advisor-contracts';
import languageSignaturesJson from './data/language-signatures.json' with { type: 'json' };
import categoryKeywordsJson from './data/category-keywords.json' with { type: 'json' };
import locationsJson from './data/locations.json' with { type: 'json' };
import cropsJson from './data/crops.json' with { type: 'json' };
import seasonsJson from './data/seasons.json' with { type: 'json' };
import type {
  CategoryKeywordTable,
  ClassifierTables,
  LanguageSignature,
  LocationEntry,
  NamedAliases,
} from './types.js';

export interface RawSignature {
  code: string;
  script: string;
  range: string[];
  markers: string[];
}

export interface RawLocation {
  name: string;
  kind: string;
  aliases: string[];
}

function parseCodePoint(hex: string | undefined, code: string): number {
  const value = hex === undefined ? Number.NaN : Number.parseInt(hex, 16);
  if (Number.isNaN(value)) {
    throw new ConfigurationError(`Language signature '${code}' has an invalid script range`);
  }
  return value;
}

export function toLanguageSignatures(raw: readonly RawSignature[]): LanguageSignature[] {
  return raw.map((entry) => {
    if (!isSupportedLanguage(entry.code)) {
      throw new ConfigurationError(`Language signature for unsupported language '${entry.code}'`);
    }
    const [start, end] = entry.range;
    return {
      code: entry.code,
      script: entry.script,
      range: [parseCodePoint(start, entry.code), parseCodePoint(end, entry.code)],
      markers: entry.markers,
    };
  });
}

export function toLocations(raw: readonly RawLocation[]): LocationEntry[] {
  return raw.map((entry) => {
    if (entry.kind !== 'city' && entry.kind !== 'state') {
      throw new ConfigurationError(`Location '${entry.name}' has unknown kind '${entry.kind}'`);
    }
    return { name: entry.name, kind: entry.kind, aliases: entry.aliases };
  });
}

const categoryKeywords: CategoryKeywordTable = categoryKeywordsJson;
const crops: readonly NamedAliases[] = cropsJson;
const seasons: readonly NamedAliases[] = seasonsJson;

export const DEFAULT_TABLES: ClassifierTables = Object.freeze({
  languageSignatures: toLanguageSignatures(languageSignaturesJson),
  categoryKeywords,
  locations: toLocations(locationsJson),
  crops,
  seasons,
});
