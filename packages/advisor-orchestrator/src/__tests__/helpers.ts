/**
 * Shared fakes for orchestrator tests.
 */

import { vi, type Mock } from 'vitest';
import type {
  Classification,
  DomainCategory,
  ILogger,
  Query,
  QueryContext,
  Specialist,
  SpecialistPayload,
} from '@field-advisor/advisor-contracts';

// Mock logger
export const createMockLogger = (): ILogger => ({
  info: vi.fn(),
  error: vi.fn(),
  warn: vi.fn(),
  debug: vi.fn(),
});

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export type Behavior = (
  query: Query,
  context: QueryContext,
  signal: AbortSignal,
) => Promise<SpecialistPayload>;

/**
 * A specialist whose invoke runs `behavior`; defaults to an immediate payload.
 */
export function makeSpecialist(
  id: string,
  category: DomainCategory,
  behavior?: Behavior,
  extra: { timeoutMs?: number } = {},
): Specialist & { invoke: Mock<Behavior> } {
  const payload: SpecialistPayload = { confidence: 0.8, source: `${id} source` };
  const run: Behavior = behavior ?? (async () => payload);
  return {
    id,
    category,
    label: `${id} label`,
    description: `${id} description`,
    capabilities: [`${id}-advice`],
    ...extra,
    invoke: vi.fn(run),
  };
}

/** Ignores its signal and never settles */
export const hang: Behavior = () => new Promise<SpecialistPayload>(() => {});

export function makeClassification(overrides: Partial<Classification> = {}): Classification {
  return {
    language: 'en',
    languageSource: 'default',
    primary: 'weather',
    secondary: [],
    scores: { weather: 1, crop: 0, finance: 0 },
    entities: {},
    context: {},
    ...overrides,
  };
}
