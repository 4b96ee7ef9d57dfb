/**
 * @module @field-advisor/advisor-orchestrator/orchestrator
 * Advisory orchestrator: classify, dispatch, synthesize.
 *
 * Stateless between calls; concurrent `handle` calls share only the
 * read-only registry and classifier.
 */

import {
  DEFAULT_ADVISOR_CONFIG,
  errorMessage,
  type AdvisorConfig,
  type Classification,
  type DomainCategory,
  type ILogger,
  type Query,
  type SynthesizedResponse,
} from '@field-advisor/advisor-contracts';
import { ProgressReporter, type ProgressCallback } from '@field-advisor/progress-reporter';
import { HeuristicQueryClassifier, type IQueryClassifier } from '@field-advisor/query-classifier';
import { SpecialistDispatcher } from './dispatcher.js';
import { createSessionId } from './history-storage.js';
import type { AdvisoryHistory, IHistoryStorage } from './history-types.js';
import type { SpecialistRegistry } from './specialist-registry.js';
import { synthesize } from './synthesizer.js';

export interface AdvisoryOrchestratorOptions {
  registry: SpecialistRegistry;
  logger: ILogger;
  config?: AdvisorConfig;
  /** Defaults to HeuristicQueryClassifier with the config's classifier section */
  classifier?: IQueryClassifier;
  /** History is offered each response without being awaited */
  historyStorage?: IHistoryStorage;
}

export interface HandleOptions {
  signal?: AbortSignal;
  onProgress?: ProgressCallback;
  /** Defaults to a generated id */
  sessionId?: string;
  /** Route to this category only, whatever the classifier scores */
  category?: DomainCategory;
}

function pinCategory(classification: Classification, category?: DomainCategory): Classification {
  if (category === undefined) {
    return classification;
  }
  return Object.freeze({ ...classification, primary: category, secondary: Object.freeze([]) });
}

/**
 * Advisory orchestrator.
 *
 * 1. Classify language, category and context
 * 2. Dispatch to the resolved specialists concurrently
 * 3. Synthesize one response
 * 4. Offer the run to history storage
 *
 * @example
 * ```typescript
 * const orchestrator = new AdvisoryOrchestrator({ registry, logger });
 *
 * const response = await orchestrator.handle(
 *   createQuery({ text: 'Will it rain in Pune tomorrow?' }),
 * );
 * console.log(response.sources, response.confidence);
 * ```
 */
export class AdvisoryOrchestrator {
  private readonly classifier: IQueryClassifier;
  private readonly dispatcher: SpecialistDispatcher;
  private readonly logger: ILogger;
  private readonly historyStorage?: IHistoryStorage;

  constructor(options: AdvisoryOrchestratorOptions) {
    const config = options.config ?? DEFAULT_ADVISOR_CONFIG;
    this.logger = options.logger;
    this.classifier = options.classifier ?? new HeuristicQueryClassifier(config.classifier);
    this.dispatcher = new SpecialistDispatcher(options.registry, options.logger, config.dispatch);
    this.historyStorage = options.historyStorage;
  }

  /**
   * Answer a query. Never rejects; an internal error yields a response
   * with `success: false` and confidence 0.
   */
  async handle(query: Query, options: HandleOptions = {}): Promise<SynthesizedResponse> {
    const startTime = Date.now();
    const sessionId = options.sessionId ?? createSessionId(startTime);
    const reporter = new ProgressReporter(this.logger, options.onProgress);

    let classification: Classification | undefined;
    let response: SynthesizedResponse;
    let failure: string | undefined;

    try {
      reporter.start(query.text, query.comprehensive);

      classification = pinCategory(this.classifier.classify(query), options.category);
      reporter.classified(classification);

      const results = await this.dispatcher.dispatch(classification, query, options.signal, {
        onSpecialistStart: (specialist) => reporter.specialistStarted(specialist.id, specialist.category),
        onSpecialistSettled: (result) => reporter.specialistSettled(result),
      });

      response = synthesize(results);
      reporter.complete(response);
    } catch (error) {
      failure = errorMessage(error);
      this.logger.error(`Advisory run failed: ${failure}`, { sessionId });
      response = synthesize([]);
    }

    if (classification) {
      const endTime = Date.now();
      this.recordHistory({
        sessionId,
        query,
        classification,
        response,
        startTime,
        endTime,
        durationMs: endTime - startTime,
        success: response.success,
        ...(failure !== undefined ? { error: failure } : {}),
      });
    }

    return response;
  }

  /**
   * Fire-and-forget save; a storage error is a warning, never a failed query.
   */
  private recordHistory(history: AdvisoryHistory): void {
    const storage = this.historyStorage;
    if (!storage) {
      return;
    }

    void Promise.resolve()
      .then(() => storage.save(history))
      .then(
        () => this.logger.debug(`Query history saved: ${history.sessionId}`),
        (error: unknown) =>
          this.logger.warn(`Failed to save query history: ${errorMessage(error)}`, {
            sessionId: history.sessionId,
          }),
      );
  }
}
