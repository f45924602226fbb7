/**
 * Scheduler Error Types
 *
 * @module breakfast-scheduler/engine/errors
 */

/**
 * Machine-readable scheduler error codes
 */
export type SchedulerErrorCode = 'RESOURCE_EXHAUSTED' | 'INVALID_UNIT';

/**
 * Base error class for scheduler failures.
 *
 * @example
 * ```typescript
 * throw SchedulerError.resourceExhausted(20, 16);
 * throw SchedulerError.invalidUnit('toast', 'duration must be >= 0');
 * ```
 */
export class SchedulerError extends Error {
  /**
   * @param message - Human-readable error message
   * @param code - Machine-readable error code
   * @param cause - Optional underlying error
   */
  constructor(
    message: string,
    public code: SchedulerErrorCode,
    cause?: Error
  ) {
    super(message, cause ? { cause } : undefined);
    this.name = 'SchedulerError';

    // Maintain proper stack trace (only available in V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SchedulerError);
    }
  }

  /**
   * Create error for a concurrent run that needs more execution contexts
   * than the scheduler has.
   *
   * Raised before any unit is dispatched, so the run produces no output.
   */
  static resourceExhausted(requested: number, capacity: number): SchedulerError {
    return new SchedulerError(
      `Cannot allocate ${requested} execution contexts (capacity ${capacity})`,
      'RESOURCE_EXHAUSTED'
    );
  }

  /**
   * Create error for a work unit with invalid parameters.
   */
  static invalidUnit(name: string, reason: string): SchedulerError {
    return new SchedulerError(`Invalid work unit "${name}": ${reason}`, 'INVALID_UNIT');
  }

  /**
   * Check whether an error is a resource exhaustion failure
   */
  static isResourceExhausted(error: unknown): error is SchedulerError {
    return error instanceof SchedulerError && error.code === 'RESOURCE_EXHAUSTED';
  }
}
