/**
 * breakfast-scheduler
 *
 * Sequential vs. concurrent execution of independent work units, with
 * optional synchronization of their console output.
 *
 * @module breakfast-scheduler
 */

// Re-export all layers
export * from "./engine/index.js";
export * from "./output/sinks.js";

// Convenience exports for common use cases
export { main } from "./engine/runner.js";
export { Scheduler } from "./engine/scheduler.js";
export { ConsoleSink } from "./output/sinks.js";

// Type exports
export type {
  ExecutionMode,
  OutputSink,
  RunResult,
  WorkUnitSpec,
} from "./engine/types.js";
