/**
 * Error taxonomy shared by the differ, the gate and its collaborators.
 *
 * @module @driftgate/core/errors
 */

/**
 * Base error for everything raised by driftgate packages
 */
export class DriftgateError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DriftgateError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * A single problem found while validating an input value
 */
export interface ValidationIssue {
  /** Encoded location of the problem inside the input */
  path: string;
  message: string;
}

/**
 * Malformed tree or patch, rejected before any processing happens
 */
export class ValidationError extends DriftgateError {
  constructor(
    message: string,
    public readonly issues: ValidationIssue[] = [],
    context?: Record<string, unknown>
  ) {
    super(message, 'VALIDATION_ERROR', context);
    this.name = 'ValidationError';
  }
}

/**
 * Why an approval lookup failed
 */
export type LookupFailureReason =
  | 'timeout'
  | 'transport'
  | 'authorization'
  | 'not_found'
  | 'malformed_response'
  | 'aborted'
  | 'not_configured'
  | 'unknown';

/**
 * Approval fetch failure of any kind.
 *
 * Returned inside a failed lookup result rather than thrown; the gate turns
 * it into a blocked decision.
 */
export class LookupError extends DriftgateError {
  constructor(
    message: string,
    public readonly reason: LookupFailureReason,
    context?: Record<string, unknown>
  ) {
    super(message, 'LOOKUP_ERROR', context);
    this.name = 'LookupError';
  }
}

/**
 * Normalize anything caught into a LookupError
 */
export function toLookupError(error: unknown): LookupError {
  if (error instanceof LookupError) {
    return error;
  }
  if (error instanceof Error) {
    const reason: LookupFailureReason =
      error.name === 'AbortError' ? 'aborted' : error.name === 'TimeoutError' ? 'timeout' : 'unknown';
    return new LookupError(error.message, reason, { cause: error.name });
  }
  return new LookupError(String(error), 'unknown');
}
