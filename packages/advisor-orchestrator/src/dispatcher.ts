/**
 * SpecialistDispatcher: concurrent fan-out with per-invocation deadlines.
 *
 * - Cancel tree: each invocation gets its own AbortController linked to
 *   the caller's signal; a timed-out invocation is aborted
 * - Join: returns once every target has settled or hit its deadline;
 *   late results are discarded
 * - Containment: throws and invalid payloads become `failure` results,
 *   throwing hooks are logged; the returned promise never rejects
 * - Result order equals target order, not completion order
 */

import {
  DEFAULT_ADVISOR_CONFIG,
  SpecialistPayloadError,
  SpecialistTimeoutError,
  errorMessage,
  validateSpecialistPayload,
  type Classification,
  type DispatchConfig,
  type ILogger,
  type Query,
  type Specialist,
  type SpecialistPayload,
  type SpecialistResult,
} from '@field-advisor/advisor-contracts';
import type { SpecialistRegistry } from './specialist-registry.js';

/** Reason recorded when the caller's signal aborts a dispatch */
export const ABORTED_REASON = 'aborted';

/**
 * Progress hooks; called synchronously around each invocation.
 */
export interface DispatchHooks {
  onSpecialistStart?(specialist: Specialist): void;
  onSpecialistSettled?(result: SpecialistResult): void;
}

type Settlement =
  | { kind: 'payload'; payload: unknown }
  | { kind: 'error'; error: unknown }
  | { kind: 'timeout' }
  | { kind: 'aborted' };

export class SpecialistDispatcher {
  private readonly config: DispatchConfig;

  constructor(
    private readonly registry: SpecialistRegistry,
    private readonly logger: ILogger,
    config: Partial<DispatchConfig> = {},
  ) {
    this.config = { ...DEFAULT_ADVISOR_CONFIG.dispatch, ...config };
  }

  /**
   * Specialists a classification fans out to, de-duplicated by id.
   * Falls back to the whole registry when nothing resolves.
   */
  selectTargets(classification: Classification, query: Query): Specialist[] {
    const categories = query.comprehensive
      ? [classification.primary, ...classification.secondary]
      : [classification.primary];

    const targets: Specialist[] = [];
    const seen = new Set<string>();
    for (const category of categories) {
      for (const specialist of this.registry.resolve(category)) {
        if (!seen.has(specialist.id)) {
          seen.add(specialist.id);
          targets.push(specialist);
        }
      }
    }

    return targets.length > 0 ? targets : [...this.registry.getAll()];
  }

  /**
   * Invoke every target concurrently and collect one result per target.
   */
  async dispatch(
    classification: Classification,
    query: Query,
    signal?: AbortSignal,
    hooks: DispatchHooks = {},
  ): Promise<SpecialistResult[]> {
    const targets = this.selectTargets(classification, query);
    this.logger.debug('Dispatching query', {
      primary: classification.primary,
      targets: targets.map((specialist) => specialist.id),
    });

    if (signal?.aborted) {
      return targets.map((specialist) => {
        const result = this.toResult(specialist, { kind: 'aborted' }, 0);
        this.notify('onSpecialistSettled', () => hooks.onSpecialistSettled?.(result));
        return result;
      });
    }

    return Promise.all(
      targets.map((specialist) =>
        this.runOne(specialist, query, classification, signal, hooks),
      ),
    );
  }

  // ── Private helpers ─────────────────────────────────────────────────

  private async runOne(
    specialist: Specialist,
    query: Query,
    classification: Classification,
    parentSignal: AbortSignal | undefined,
    hooks: DispatchHooks,
  ): Promise<SpecialistResult> {
    const budgetMs = specialist.timeoutMs ?? this.config.timeoutMs;
    const startTime = Date.now();

    // Per-invocation AbortController linked to the caller's signal
    const controller = new AbortController();
    const cleanups: Array<() => void> = [];

    const deadline = new Promise<Settlement>((resolve) => {
      const timer = setTimeout(() => resolve({ kind: 'timeout' }), budgetMs);
      cleanups.push(() => clearTimeout(timer));
    });
    const aborted = new Promise<Settlement>((resolve) => {
      if (!parentSignal) {
        return;
      }
      const signal = parentSignal;
      const onParentAbort = () => {
        controller.abort(signal.reason);
        resolve({ kind: 'aborted' });
      };
      signal.addEventListener('abort', onParentAbort, { once: true });
      cleanups.push(() => signal.removeEventListener('abort', onParentAbort));
    });

    let settlement: Settlement;
    try {
      this.notify('onSpecialistStart', () => hooks.onSpecialistStart?.(specialist));

      const invocation = Promise.resolve()
        .then(() => specialist.invoke(query, classification.context, controller.signal))
        .then(
          (payload): Settlement => ({ kind: 'payload', payload }),
          (error: unknown): Settlement => ({ kind: 'error', error }),
        );

      settlement = await Promise.race([invocation, deadline, aborted]);
    } finally {
      for (const cleanup of cleanups) {
        cleanup();
      }
    }

    if (settlement.kind === 'timeout') {
      controller.abort(new SpecialistTimeoutError(specialist.id, budgetMs));
    }

    const result = this.toResult(specialist, settlement, Date.now() - startTime, budgetMs);
    if (result.outcome === 'success') {
      this.logger.debug(`Specialist '${specialist.id}' succeeded`, { durationMs: result.durationMs });
    } else {
      this.logger.warn(`Specialist '${specialist.id}' ${result.outcome}: ${result.reason}`, {
        specialistId: specialist.id,
        durationMs: result.durationMs,
      });
    }

    this.notify('onSpecialistSettled', () => hooks.onSpecialistSettled?.(result));
    return result;
  }

  /**
   * Hooks are observers; a throwing hook is logged and ignored.
   */
  private notify(hook: keyof DispatchHooks, call: () => void): void {
    try {
      call();
    } catch (error) {
      this.logger.warn(`Dispatch hook ${hook} failed: ${errorMessage(error)}`);
    }
  }

  private toResult(
    specialist: Specialist,
    settlement: Settlement,
    durationMs: number,
    budgetMs: number = this.config.timeoutMs,
  ): SpecialistResult {
    const base = { specialistId: specialist.id, category: specialist.category, durationMs };

    switch (settlement.kind) {
      case 'payload': {
        const validation = validateSpecialistPayload(settlement.payload);
        if (validation.success && validation.data) {
          const payload: SpecialistPayload = validation.data;
          return Object.freeze({ ...base, outcome: 'success' as const, payload });
        }
        const reason = new SpecialistPayloadError(specialist.id, validation.issues ?? []).message;
        return Object.freeze({ ...base, outcome: 'failure' as const, reason });
      }
      case 'error':
        return Object.freeze({ ...base, outcome: 'failure' as const, reason: errorMessage(settlement.error) });
      case 'timeout':
        return Object.freeze({
          ...base,
          outcome: 'timeout' as const,
          reason: new SpecialistTimeoutError(specialist.id, budgetMs).message,
        });
      case 'aborted':
        return Object.freeze({ ...base, outcome: 'failure' as const, reason: ABORTED_REASON });
    }
  }
}
