/**
 * @module @field-advisor/advisor-contracts/errors
 * Error taxonomy.
 *
 * Only `ConfigurationError` (startup) and `QueryValidationError` (transport)
 * ever reach a caller. Specialist errors are converted to results by the
 * dispatcher.
 */

export type AdvisorErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'QUERY_VALIDATION_ERROR'
  | 'SPECIALIST_TIMEOUT'
  | 'SPECIALIST_PAYLOAD_INVALID';

export class AdvisorError extends Error {
  constructor(
    readonly code: AdvisorErrorCode,
    message: string,
    readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends AdvisorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFIGURATION_ERROR', message, details);
  }
}

export class QueryValidationError extends AdvisorError {
  constructor(readonly issues: string[]) {
    super('QUERY_VALIDATION_ERROR', `Invalid query: ${issues.join('; ')}`, { issues });
  }
}

export class SpecialistTimeoutError extends AdvisorError {
  constructor(specialistId: string, readonly timeoutMs: number) {
    super('SPECIALIST_TIMEOUT', `Specialist '${specialistId}' timed out after ${timeoutMs}ms`, {
      specialistId,
      timeoutMs,
    });
  }
}

export class SpecialistPayloadError extends AdvisorError {
  constructor(specialistId: string, readonly issues: string[]) {
    super(
      'SPECIALIST_PAYLOAD_INVALID',
      `Specialist '${specialistId}' returned an invalid payload: ${issues.join('; ')}`,
      { specialistId, issues },
    );
  }
}

/**
 * Best-effort message extraction for anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
