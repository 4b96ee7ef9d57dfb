/**
 * @module @field-advisor/advisor-orchestrator
 * Specialist registry, concurrent dispatch and response synthesis.
 *
 * @example
 * ```typescript
 * import { createQuery } from '@field-advisor/advisor-contracts';
 * import {
 *   AdvisoryOrchestrator,
 *   SpecialistRegistry,
 *   createLogger,
 * } from '@field-advisor/advisor-orchestrator';
 *
 * const registry = SpecialistRegistry.create([weather, crop, finance]);
 * const orchestrator = new AdvisoryOrchestrator({ registry, logger: createLogger('advisor') });
 *
 * const response = await orchestrator.handle(
 *   createQuery({ text: 'Loan and seeds for 2 acres of cotton', comprehensive: true }),
 * );
 * ```
 */

export { AdvisoryOrchestrator } from './orchestrator.js';
export type { AdvisoryOrchestratorOptions, HandleOptions } from './orchestrator.js';

export { SpecialistRegistry, createRegistryFromConfig } from './specialist-registry.js';
export type { SpecialistDescription, SpecialistFactory } from './specialist-registry.js';

export { SpecialistDispatcher, ABORTED_REASON } from './dispatcher.js';
export type { DispatchHooks } from './dispatcher.js';

export { synthesize, rankRecommendations } from './synthesizer.js';

export { FileHistoryStorage, createSessionId } from './history-storage.js';
export { AdvisoryHistorySchema, SessionMetadataSchema } from './history-types.js';
export type { AdvisoryHistory, IHistoryStorage, SessionMetadata } from './history-types.js';

export { loadAdvisorConfig, applyEnvOverrides, DEFAULT_CONFIG_FILE } from './config.js';
export type { LoadConfigOptions } from './config.js';

export { createLogger, fromPino } from './logger.js';
export type { CreateLoggerOptions } from './logger.js';

export { parseQueryRequest, toTransportResponse } from './transport.js';
export type { ParseQueryResult } from './transport.js';
