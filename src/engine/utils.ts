/**
 * Engine Utilities
 *
 * @module breakfast-scheduler/engine/utils
 */

/**
 * Suspend the current execution context for `ms` milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Whole seconds in a millisecond duration, truncated toward zero
 */
export function toWholeSeconds(ms: number): number {
  return Math.trunc(ms / 1000);
}

/**
 * Exhaustiveness check for closed unions
 */
export function assertNever(value: never): never {
  throw new Error(`Unexpected value: ${String(value)}`);
}
