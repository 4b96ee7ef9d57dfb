/**
 * @module @field-advisor/advisor-specialists/definitions
 * Bundled specialist definitions (role, prompt background, keywords).
 */

import { z } from 'zod';
import {
  ConfigurationError,
  DOMAIN_CATEGORIES,
  formatZodIssues,
} from '@field-advisor/advisor-contracts';
import specialistsJson from './data/specialists.json' with { type: 'json' };

export const SpecialistDefinitionSchema = z.object({
  id: z.string().regex(/^[a-z][a-z0-9-]*$/, 'Specialist id must be kebab-case'),
  category: z.enum(DOMAIN_CATEGORIES),
  label: z.string().min(1),
  description: z.string().min(1),
  capabilities: z.array(z.string().min(1)),
  role: z.string().min(1),
  goal: z.string().min(1),
  background: z.string().min(1),
  /** Confidence is the share of these found in the question */
  keywords: z.array(z.string().min(1)),
});

export type SpecialistDefinition = z.output<typeof SpecialistDefinitionSchema>;

/**
 * @throws ConfigurationError listing every issue, or on a repeated id
 */
export function parseSpecialistDefinitions(raw: unknown): SpecialistDefinition[] {
  const parsed = z.array(SpecialistDefinitionSchema).safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid specialist definitions:\n${formatZodIssues(parsed.error)
        .map((issue) => `  • ${issue}`)
        .join('\n')}`,
    );
  }

  const ids = new Set<string>();
  for (const definition of parsed.data) {
    if (ids.has(definition.id)) {
      throw new ConfigurationError(`Duplicate specialist definition '${definition.id}'`, {
        specialistId: definition.id,
      });
    }
    ids.add(definition.id);
  }
  return parsed.data;
}

export const DEFAULT_SPECIALIST_DEFINITIONS: readonly SpecialistDefinition[] = Object.freeze(
  parseSpecialistDefinitions(specialistsJson),
);
