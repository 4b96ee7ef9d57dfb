/**
 * @module @field-advisor/progress-reporter
 * UX-only progress feedback for advisory query runs.
 *
 * Provides real-time progress events for the CLI and streaming transports.
 * Events are invisible to orchestrator logic.
 *
 * @example
 * ```typescript
 * import { ProgressReporter } from '@field-advisor/progress-reporter';
 *
 * // CLI usage
 * const reporter = new ProgressReporter(logger);
 * reporter.start('Will it rain in Pune?', false);
 * reporter.classified(classification);
 * reporter.specialistStarted('weather', 'weather');
 * reporter.specialistSettled(result);
 * reporter.complete(response);
 *
 * // Streaming usage (with callback)
 * const reporter = new ProgressReporter(logger, (event) => {
 *   ws.send(JSON.stringify(event));
 * });
 * ```
 */

export { ProgressReporter } from './reporter.js';

export type {
  ProgressEvent,
  ProgressEventType,
  ProgressCallback,
  QueryStartedEvent,
  QueryClassifiedEvent,
  SpecialistEvent,
  QueryCompletedEvent,
} from './types.js';
