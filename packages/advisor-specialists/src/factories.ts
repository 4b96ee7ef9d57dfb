/**
 * Registry factories for the bundled specialists.
 */

import type { ILLM, Specialist, SpecialistSettings } from '@field-advisor/advisor-contracts';
import { DEFAULT_SPECIALIST_DEFINITIONS, type SpecialistDefinition } from './definitions.js';
import { PromptSpecialist, type PromptSpecialistOptions } from './prompt-specialist.js';

export type SpecialistFactoryMap = Record<string, (settings: SpecialistSettings) => Specialist>;

/**
 * One factory per definition, keyed by specialist id, for
 * `createRegistryFromConfig`.
 *
 * @example
 * ```typescript
 * const registry = createRegistryFromConfig(
 *   config,
 *   createSpecialistFactories(new OpenAIChatLLM({ apiKey })),
 * );
 * ```
 */
export function createSpecialistFactories(
  llm: ILLM,
  defaults: Omit<PromptSpecialistOptions, 'timeoutMs'> = {},
  definitions: readonly SpecialistDefinition[] = DEFAULT_SPECIALIST_DEFINITIONS,
): SpecialistFactoryMap {
  const factories: SpecialistFactoryMap = {};
  for (const definition of definitions) {
    factories[definition.id] = (settings) =>
      new PromptSpecialist(definition, llm, {
        ...defaults,
        ...(settings.timeoutMs !== undefined ? { timeoutMs: settings.timeoutMs } : {}),
      });
  }
  return factories;
}
