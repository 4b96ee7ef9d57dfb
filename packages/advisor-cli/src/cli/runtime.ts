/**
 * Wires config, logger, registry and history into an orchestrator.
 */

import type { AdvisorConfig, ILLM } from '@field-advisor/advisor-contracts';
import {
  AdvisoryOrchestrator,
  FileHistoryStorage,
  createLogger,
  createRegistryFromConfig,
  loadAdvisorConfig,
  type SpecialistRegistry,
} from '@field-advisor/advisor-orchestrator';
import { createSpecialistFactories } from '@field-advisor/advisor-specialists';
import type { CliContext } from './context.js';

/** Stands in for the LLM when the registry is only described */
const LISTING_ONLY_LLM: ILLM = {
  complete: () => Promise.reject(new Error('LLM is not available while listing specialists')),
};

export function loadConfig(ctx: CliContext, path?: string): Promise<AdvisorConfig> {
  return loadAdvisorConfig({ cwd: ctx.cwd, env: ctx.env, ...(path ? { path } : {}) });
}

export function buildRegistry(config: AdvisorConfig, llm: ILLM = LISTING_ONLY_LLM): SpecialistRegistry {
  return createRegistryFromConfig(config, createSpecialistFactories(llm));
}

export function historyStorage(ctx: CliContext, config: AdvisorConfig): FileHistoryStorage {
  return new FileHistoryStorage(ctx.cwd, config.history.dir);
}

export function createOrchestrator(ctx: CliContext, config: AdvisorConfig): AdvisoryOrchestrator {
  const logger = createLogger('field-advisor', {
    level: config.logging.level,
    ...(ctx.logDestination ? { destination: ctx.logDestination } : {}),
  });

  return new AdvisoryOrchestrator({
    registry: buildRegistry(config, ctx.createLLM(config, ctx.env)),
    logger,
    config,
    ...(config.history.enabled ? { historyStorage: historyStorage(ctx, config) } : {}),
  });
}
