/**
 * Lambda Logging Error Types
 *
 * Errors raised while configuring loggers. Formatting and handler dispatch
 * never throw; these only surface from level parsing and explicit
 * `Logger.setLevel` calls.
 *
 * @module errors
 */

/**
 * Error codes for logging configuration failures.
 */
export type LambdaLoggingErrorCode =
  | 'INVALID_LEVEL' // Unknown level name or negative/non-integer level
  | 'CONFIGURATION'; // Invalid setup or environment configuration

/**
 * Base error class for the package.
 *
 * @example
 * ```typescript
 * throw new LambdaLoggingError('Root logger is missing', 'CONFIGURATION');
 * ```
 */
export class LambdaLoggingError extends Error {
  /**
   * Error code identifying the failure.
   */
  public readonly code: LambdaLoggingErrorCode;

  constructor(message: string, code: LambdaLoggingErrorCode) {
    super(message);
    this.name = 'LambdaLoggingError';
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LambdaLoggingError);
    }

    Object.setPrototypeOf(this, LambdaLoggingError.prototype);
  }

  /**
   * Returns a string representation of the error.
   */
  override toString(): string {
    return `${this.name} [${this.code}]: ${this.message}`;
  }
}

/**
 * Raised when a level name or number cannot be mapped to a severity.
 */
export class InvalidLevelError extends LambdaLoggingError {
  /**
   * The rejected input, as given by the caller.
   */
  public readonly input: unknown;

  constructor(input: unknown) {
    super(`Invalid log level: ${String(input)}`, 'INVALID_LEVEL');
    this.name = 'InvalidLevelError';
    this.input = input;

    Object.setPrototypeOf(this, InvalidLevelError.prototype);
  }
}

/**
 * Type guard to check if an error is a LambdaLoggingError.
 */
export function isLambdaLoggingError(error: unknown): error is LambdaLoggingError {
  return error instanceof LambdaLoggingError;
}
