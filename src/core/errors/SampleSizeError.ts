/**
 * Structured errors raised by the engine, the validator, the config loader
 * and the CLI. The code names the failure category; the context carries the
 * offending values.
 */

export enum ErrorCode {
  // Parameter errors
  INVALID_PARAMETER = 'INVALID_PARAMETER',
  DOMAIN_ERROR = 'DOMAIN_ERROR',

  // Front-end errors
  INVALID_INPUT = 'INVALID_INPUT',
  INVALID_CONFIG = 'INVALID_CONFIG',
  CANCELLED = 'CANCELLED',

  // Anything not raised on purpose
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * @example
 * ```typescript
 * throw new SampleSizeError(
 *   ErrorCode.DOMAIN_ERROR,
 *   'Target rate 1.0500 is out of bounds (0, 1). Check your MDE value.',
 *   { baseline: 0.95, target: 1.05 }
 * );
 * ```
 */
export class SampleSizeError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SampleSizeError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SampleSizeError);
    }
  }

  is(code: ErrorCode): boolean {
    return this.code === code;
  }
}

export function isSampleSizeError(error: unknown): error is SampleSizeError {
  return error instanceof SampleSizeError;
}

/**
 * Normalize whatever a catch block received. Errors that are not a
 * SampleSizeError become INTERNAL_ERROR, keeping the cause in the context.
 */
export function wrapError(error: unknown): SampleSizeError {
  if (isSampleSizeError(error)) {
    return error;
  }
  if (error instanceof Error) {
    return new SampleSizeError(ErrorCode.INTERNAL_ERROR, error.message, {
      cause: error.name,
      stack: error.stack,
    });
  }
  return new SampleSizeError(ErrorCode.INTERNAL_ERROR, String(error), { thrown: error });
}
