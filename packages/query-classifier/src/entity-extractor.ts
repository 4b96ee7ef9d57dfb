/**
 * @module @field-advisor/query-classifier/entity-extractor
 * Dictionary and pattern lookup of context fields mentioned in the text.
 */

import type { QueryContext } from '@field-advisor/advisor-contracts';
import { createTermMatcher, findFirstEntry, type TermMatcher } from './term-matcher.js';
import type { ClassifierTables, LocationEntry, NamedAliases } from './types.js';

type LandAreaUnit = 'acre' | 'hectare' | 'bigha';

const LAND_AREA_UNITS: Readonly<Record<string, LandAreaUnit>> = {
  acre: 'acre',
  acres: 'acre',
  'एकड़': 'acre',
  hectare: 'hectare',
  hectares: 'hectare',
  ha: 'hectare',
  'हेक्टेयर': 'hectare',
  bigha: 'bigha',
  bighas: 'bigha',
  'बीघा': 'bigha',
};

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function buildLandAreaPattern(): RegExp {
  const units = Object.keys(LAND_AREA_UNITS)
    .map((unit) => unit.normalize('NFC'))
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join('|');
  return new RegExp(`(\\d+(?:\\.\\d+)?)\\s*(${units})(?![\\p{L}\\p{M}\\p{N}])`, 'iu');
}

function unitFor(raw: string): LandAreaUnit | undefined {
  const normalized = raw.normalize('NFC').toLowerCase();
  for (const [alias, unit] of Object.entries(LAND_AREA_UNITS)) {
    if (alias.normalize('NFC') === normalized) {
      return unit;
    }
  }
  return undefined;
}

function compile<T extends NamedAliases>(entries: readonly T[]): { entry: T; matcher: TermMatcher }[] {
  return entries.flatMap((entry) =>
    entry.aliases.map((alias) => ({ entry, matcher: createTermMatcher(alias, 'word') })),
  );
}

/**
 * Extracts location, state, crop, land area and season from raw text.
 *
 * @example
 * ```typescript
 * const extractor = new EntityExtractor(DEFAULT_TABLES);
 * extractor.extract('Best rice for 3 acres near Nagpur in kharif');
 * // { location: 'Nagpur', cropType: 'Rice', landArea: 3, landAreaUnit: 'acre', season: 'Kharif' }
 * ```
 */
export class EntityExtractor {
  private readonly locations: { entry: LocationEntry; matcher: TermMatcher }[];
  private readonly crops: { entry: NamedAliases; matcher: TermMatcher }[];
  private readonly seasons: { entry: NamedAliases; matcher: TermMatcher }[];
  private readonly landAreaPattern = buildLandAreaPattern();

  constructor(tables: Pick<ClassifierTables, 'locations' | 'crops' | 'seasons'>) {
    this.locations = compile(tables.locations);
    this.crops = compile(tables.crops);
    this.seasons = compile(tables.seasons);
  }

  extract(text: string): QueryContext {
    const normalized = text.normalize('NFC');
    const location = findFirstEntry(normalized, this.locations);
    const crop = findFirstEntry(normalized, this.crops);
    const season = findFirstEntry(normalized, this.seasons);
    const landArea = this.extractLandArea(normalized);

    return {
      ...(location ? { location: location.name } : {}),
      ...(location?.kind === 'state' ? { state: location.name } : {}),
      ...(crop ? { cropType: crop.name } : {}),
      ...(landArea ?? {}),
      ...(season ? { season: season.name } : {}),
    };
  }

  private extractLandArea(text: string): { landArea: number; landAreaUnit: LandAreaUnit } | undefined {
    const match = this.landAreaPattern.exec(text);
    if (!match) {
      return undefined;
    }
    const [, amount, rawUnit] = match;
    const unit = rawUnit === undefined ? undefined : unitFor(rawUnit);
    const value = amount === undefined ? Number.NaN : Number.parseFloat(amount);
    if (unit === undefined || Number.isNaN(value)) {
      return undefined;
    }
    return { landArea: value, landAreaUnit: unit };
  }
}

/**
 * Merge inferred entities into explicit context. Explicit keys always win;
 * explicit keys set to `undefined` do not erase an inferred value.
 * Inferred `location` and `state` come from one place mention, so an explicit
 * `location` or `state` replaces both.
 */
export function mergeContext(explicit: QueryContext, inferred: QueryContext): QueryContext {
  const merged: Record<string, unknown> = { ...inferred };
  if (explicit.location !== undefined || explicit.state !== undefined) {
    delete merged.location;
    delete merged.state;
  }
  for (const [key, value] of Object.entries(explicit)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }
  return merged;
}
