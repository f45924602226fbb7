/**
 * Engine Types
 *
 * Core types for running work units sequentially or concurrently.
 *
 * @module breakfast-scheduler/engine/types
 */

/**
 * How the scheduler dispatches a set of work units
 *
 * - 'sequential' → one unit after another on the calling context
 * - 'concurrent-unsynchronized' → all units at once, output may interleave
 * - 'concurrent-synchronized' → all units at once, start messages guarded
 */
export type ExecutionMode =
  | 'sequential'
  | 'concurrent-unsynchronized'
  | 'concurrent-synchronized';

/**
 * Parameters of a single simulated unit of work
 */
export interface WorkUnitSpec {
  /** Name used in the start/finish messages (e.g. "coffee") */
  name: string;

  /** How long the unit blocks, in milliseconds (integer, >= 0) */
  durationMs: number;
}

/**
 * Write-only destination for console lines
 */
export interface OutputSink {
  /**
   * Write one line. The returned promise settles once the line is written.
   */
  write(line: string): Promise<void>;
}

/**
 * Start/finish offsets of one unit, relative to the start of the run
 */
export interface UnitTiming {
  name: string;
  startedAtMs: number;
  finishedAtMs: number;
}

/**
 * Result of one scheduler run
 */
export interface RunResult {
  /** Mode the run executed under */
  mode: ExecutionMode;

  /** Wall-clock time from dispatch to join, in milliseconds */
  totalElapsedMs: number;

  /** Per-unit timings, in input order */
  units: UnitTiming[];
}

/**
 * Diagnostic logger callback
 */
export type SchedulerLogger = (message: string) => void;

/**
 * Scheduler configuration
 */
export interface SchedulerOptions {
  /**
   * Number of execution contexts available to a concurrent run
   * @default 16
   */
  maxConcurrent?: number;

  /**
   * Receives diagnostic messages (dispatch, completion, join)
   * @default no-op
   */
  logger?: SchedulerLogger;
}

/**
 * Runner configuration
 */
export interface RunnerOptions {
  /**
   * Where unit messages and the total line are written
   * @default ConsoleSink
   */
  sink?: OutputSink;

  /**
   * Workload to run
   * @default coffee (2000ms) and toast (3000ms)
   */
  units?: WorkUnitSpec[];

  /** Options for the scheduler the runner creates */
  scheduler?: SchedulerOptions;
}
