/**
 * @module @field-advisor/advisor-orchestrator/specialist-registry
 * Category -> specialists lookup.
 *
 * Built once at startup and frozen. Every domain category must map to at
 * least one specialist, so `resolve` never comes back empty.
 */

import {
  ConfigurationError,
  DOMAIN_CATEGORIES,
  type AdvisorConfig,
  type Category,
  type DomainCategory,
  type Specialist,
  type SpecialistSettings,
} from '@field-advisor/advisor-contracts';

/**
 * Builds a specialist from its advisor.yml settings.
 */
export type SpecialistFactory = (settings: SpecialistSettings) => Specialist;

/**
 * Catalogue entry (what `field-advisor specialists` prints).
 */
export interface SpecialistDescription {
  id: string;
  label: string;
  category: DomainCategory;
  description: string;
  capabilities: readonly string[];
  timeoutMs?: number;
}

export class SpecialistRegistry {
  private constructor(
    private readonly specialists: readonly Specialist[],
    private readonly byCategory: ReadonlyMap<DomainCategory, readonly Specialist[]>,
  ) {
    Object.freeze(this);
  }

  /**
   * @throws ConfigurationError when an id repeats or a domain category has no specialist
   */
  static create(specialists: readonly Specialist[]): SpecialistRegistry {
    const seen = new Set<string>();
    for (const specialist of specialists) {
      if (seen.has(specialist.id)) {
        throw new ConfigurationError(`Duplicate specialist id '${specialist.id}'`, {
          specialistId: specialist.id,
        });
      }
      seen.add(specialist.id);
    }

    const byCategory = new Map<DomainCategory, readonly Specialist[]>();
    for (const category of DOMAIN_CATEGORIES) {
      const members = specialists.filter((specialist) => specialist.category === category);
      if (members.length === 0) {
        throw new ConfigurationError(`No specialist registered for category '${category}'`, {
          category,
        });
      }
      byCategory.set(category, Object.freeze(members));
    }

    return new SpecialistRegistry(Object.freeze([...specialists]), byCategory);
  }

  /**
   * Specialists for a category in registration order; `general` yields all.
   */
  resolve(category: Category): readonly Specialist[] {
    if (category === 'general') {
      return this.specialists;
    }
    return this.byCategory.get(category) ?? [];
  }

  /**
   * Get all registered specialists
   */
  getAll(): readonly Specialist[] {
    return this.specialists;
  }

  /**
   * Get specialist by ID
   */
  get(id: string): Specialist | undefined {
    return this.specialists.find((specialist) => specialist.id === id);
  }

  count(): number {
    return this.specialists.length;
  }

  describe(): SpecialistDescription[] {
    return this.specialists.map((specialist) => ({
      id: specialist.id,
      label: specialist.label,
      category: specialist.category,
      description: specialist.description,
      capabilities: specialist.capabilities,
      ...(specialist.timeoutMs !== undefined ? { timeoutMs: specialist.timeoutMs } : {}),
    }));
  }
}

/**
 * Build the registry from the `specialists` section of advisor.yml.
 *
 * Factories are keyed by specialist id; an id missing from the config is
 * enabled with defaults, a disabled one is skipped.
 *
 * @throws ConfigurationError for config entries with no factory, or when
 * disabling leaves a category empty
 */
export function createRegistryFromConfig(
  config: Pick<AdvisorConfig, 'specialists'>,
  factories: Readonly<Record<string, SpecialistFactory>>,
): SpecialistRegistry {
  const unknown = Object.keys(config.specialists).filter((id) => !(id in factories));
  if (unknown.length > 0) {
    throw new ConfigurationError(`Unknown specialist(s) in config: ${unknown.join(', ')}`, {
      unknown,
    });
  }

  const specialists: Specialist[] = [];
  for (const [id, factory] of Object.entries(factories)) {
    const settings = config.specialists[id] ?? { enabled: true };
    if (settings.enabled) {
      specialists.push(factory(settings));
    }
  }

  return SpecialistRegistry.create(specialists);
}
