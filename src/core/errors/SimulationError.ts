/**
 * Core error handling for the prize simulation
 *
 * Every failure the library surfaces is a SimulationError carrying:
 * - A structured error code for the failure category
 * - Optional context for debugging
 * - A proper V8 stack trace
 */

/**
 * Error codes for every failure category the library reports
 */
export enum ErrorCode {
  // Caller errors
  INVALID_INPUT = 'INVALID_INPUT',
  INVALID_CONFIG = 'INVALID_CONFIG',

  // Broken invariants
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Error with a structured code and context
 *
 * @example
 * ```typescript
 * throw new SimulationError(
 *   ErrorCode.INVALID_INPUT,
 *   'Trial count must be a positive integer',
 *   { trialCount: 0 }
 * );
 * ```
 */
export class SimulationError extends Error {
  /**
   * @param code - Error category
   * @param message - Human-readable error message
   * @param context - Optional values for debugging
   */
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SimulationError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SimulationError);
    }
  }

  /**
   * Code, message and context on one line
   */
  toString(): string {
    const contextStr = this.context ? ` Context: ${JSON.stringify(this.context)}` : '';
    return `${this.name} [${this.code}]: ${this.message}${contextStr}`;
  }

  is(code: ErrorCode): boolean {
    return this.code === code;
  }

  isOneOf(codes: ErrorCode[]): boolean {
    return codes.includes(this.code);
  }
}

/**
 * Type guard for SimulationError
 */
export function isSimulationError(error: unknown): error is SimulationError {
  return error instanceof SimulationError;
}

/**
 * Wrap anything thrown as a SimulationError
 * Useful for catch blocks where the error type is unknown
 */
export function wrapError(
  error: unknown,
  code: ErrorCode = ErrorCode.INTERNAL_ERROR
): SimulationError {
  if (isSimulationError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const context =
    error instanceof Error ? { originalStack: error.stack } : { originalError: error };

  return new SimulationError(code, message, context);
}
