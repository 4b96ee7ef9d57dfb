/**
 * @module @field-advisor/progress-reporter/reporter
 * Progress reporter for advisory query runs.
 *
 * UX-only component - events are NOT visible to the orchestrator.
 * Used for real-time progress feedback in the CLI and any streaming transport.
 */

import type {
  Classification,
  DomainCategory,
  ILogger,
  SpecialistResult,
  SynthesizedResponse,
} from '@field-advisor/advisor-contracts';
import type { ProgressCallback, ProgressEvent } from './types.js';

/**
 * Progress reporter - emits UX-only progress events.
 *
 * One reporter per query run; it tracks the run's start time.
 *
 * - **UX-only**: Events are invisible to orchestrator logic
 * - **Visual**: Category emoji (🌦️🌾💰) for quick status understanding
 *
 * @example
 * ```typescript
 * const reporter = new ProgressReporter(logger, (event) => {
 *   // Stream to a client via SSE
 *   res.write(`data: ${JSON.stringify(event)}\n\n`);
 * });
 *
 * reporter.start('Will it rain in Pune?', false);
 * reporter.classified(classification);
 * // ... dispatch
 * reporter.complete(response);
 * ```
 */
export class ProgressReporter {
  private events: ProgressEvent[] = [];
  private startTime: number = 0;

  constructor(
    private readonly logger: ILogger,
    private readonly onProgress?: ProgressCallback,
  ) {}

  /**
   * Start tracking a new query.
   */
  start(text: string, comprehensive: boolean): void {
    this.startTime = Date.now();
    this.emit({
      type: 'query_started',
      timestamp: this.startTime,
      data: { text, comprehensive },
    });
    this.logger.info(`🎯 Query started${comprehensive ? ' (comprehensive)' : ''}: ${text}`);
  }

  /**
   * Report classification result.
   */
  classified(classification: Classification): void {
    const { language, languageSource, primary, secondary } = classification;
    this.emit({
      type: 'query_classified',
      timestamp: Date.now(),
      data: { language, languageSource, primary, secondary },
    });

    const extra = secondary.length > 0 ? ` + ${secondary.join(', ')}` : '';
    this.logger.info(`🧭 Classified as '${primary}'${extra} (language: ${language}, ${languageSource})`);
  }

  /**
   * Report that a specialist invocation began.
   */
  specialistStarted(specialistId: string, category: DomainCategory): void {
    this.emit({
      type: 'specialist_started',
      timestamp: Date.now(),
      data: { specialistId, category },
    });
    this.logger.info(`${this.getCategoryEmoji(category)} [${specialistId}] Starting`);
  }

  /**
   * Report a settled specialist invocation.
   */
  specialistSettled(result: SpecialistResult): void {
    const { specialistId, category, durationMs } = result;
    const emoji = this.getCategoryEmoji(category);

    switch (result.outcome) {
      case 'success':
        this.emit({
          type: 'specialist_completed',
          timestamp: Date.now(),
          data: { specialistId, category, durationMs, confidence: result.payload.confidence },
        });
        this.logger.info(
          `✅ ${emoji} [${specialistId}] Completed in ${durationMs}ms (confidence ${result.payload.confidence.toFixed(2)})`,
        );
        break;
      case 'failure':
        this.emit({
          type: 'specialist_failed',
          timestamp: Date.now(),
          data: { specialistId, category, durationMs, reason: result.reason },
        });
        this.logger.error(`❌ ${emoji} [${specialistId}] Failed: ${result.reason}`);
        break;
      case 'timeout':
        this.emit({
          type: 'specialist_timed_out',
          timestamp: Date.now(),
          data: { specialistId, category, durationMs, reason: result.reason },
        });
        this.logger.warn(`⏱️  ${emoji} [${specialistId}] Timed out: ${result.reason}`);
        break;
    }
  }

  /**
   * Report query completion.
   */
  complete(response: SynthesizedResponse): void {
    const totalDuration = Date.now() - this.startTime;
    const status = response.success ? 'success' : 'failed';
    const emoji = response.success ? '✅' : '❌';

    this.emit({
      type: 'query_completed',
      timestamp: Date.now(),
      data: {
        status,
        totalDuration,
        confidence: response.confidence,
        sources: response.sources,
        failureCount: response.failures.length,
      },
    });

    this.logger.info(`${emoji} Query ${status} in ${(totalDuration / 1000).toFixed(1)}s`);
    this.logger.info(
      `📊 Confidence: ${response.confidence.toFixed(2)} | Sources: ${response.sources.join(', ') || 'none'}`,
    );
    if (response.failures.length > 0) {
      this.logger.warn(`⚠️  ${response.failures.length} specialist(s) did not contribute`);
    }
  }

  /**
   * Get all emitted events (for debugging/testing).
   */
  getEvents(): readonly ProgressEvent[] {
    return [...this.events];
  }

  /**
   * Clear all events.
   */
  clear(): void {
    this.events = [];
    this.startTime = 0;
  }

  /**
   * Emit event to callback and store in history.
   */
  private emit(event: ProgressEvent): void {
    this.events.push(event);
    if (!this.onProgress) {
      return;
    }
    // A failing subscriber must not affect the run
    try {
      this.onProgress(event);
    } catch (error) {
      this.logger.warn(
        `Progress callback failed on ${event.type}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  /**
   * Get emoji for category.
   */
  private getCategoryEmoji(category: DomainCategory): string {
    switch (category) {
      case 'weather':
        return '🌦️';
      case 'crop':
        return '🌾';
      case 'finance':
        return '💰';
    }
  }
}
