import { vi, type Mock } from 'vitest';
import type { ILLM } from '@field-advisor/advisor-contracts';
import { DEFAULT_SPECIALIST_DEFINITIONS, type SpecialistDefinition } from '../definitions.js';

export function bundledDefinition(id: string): SpecialistDefinition {
  const definition = DEFAULT_SPECIALIST_DEFINITIONS.find((entry) => entry.id === id);
  if (!definition) {
    throw new Error(`No bundled definition '${id}'`);
  }
  return definition;
}

export function createMockLLM(content = 'Summary line.\n- [high] First action'): {
  llm: ILLM;
  complete: Mock<ILLM['complete']>;
} {
  const complete = vi.fn<ILLM['complete']>(async () => ({ content, tokensUsed: 42 }));
  return { llm: { complete }, complete };
}
