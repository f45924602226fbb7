/**
 * Runner
 *
 * Entry point that selects an execution mode by id, runs the breakfast
 * workload and reports the total time.
 *
 * @module breakfast-scheduler/engine/runner
 */

import { ConsoleSink } from '../output/sinks.js';
import { Scheduler } from './scheduler.js';
import type { ExecutionMode, RunResult, RunnerOptions, WorkUnitSpec } from './types.js';
import { toWholeSeconds } from './utils.js';
import { WorkUnit } from './work-unit.js';

/**
 * Mode ids accepted by {@link main}
 */
export const MODE_IDS: Readonly<Record<number, ExecutionMode>> = {
  1: 'sequential',
  2: 'concurrent-unsynchronized',
  3: 'concurrent-synchronized',
};

/**
 * Human-readable description of each mode
 */
export const MODE_DESCRIPTIONS: Readonly<Record<ExecutionMode, string>> = {
  sequential: 'Run units one after another',
  'concurrent-unsynchronized': 'Run units at once, console output unguarded',
  'concurrent-synchronized': 'Run units at once, start messages guarded',
};

/**
 * Default workload: two independent breakfast tasks
 */
export const DEFAULT_WORKLOAD: readonly WorkUnitSpec[] = [
  { name: 'coffee', durationMs: 2000 },
  { name: 'toast', durationMs: 3000 },
];

/**
 * Map a mode id to its execution mode.
 *
 * Unknown ids map to `null`; the runner treats them as a no-op.
 */
export function modeFromId(modeId: number): ExecutionMode | null {
  return Object.hasOwn(MODE_IDS, modeId) ? MODE_IDS[modeId] : null;
}

/**
 * Format the final report line
 */
export function formatTotalTime(totalElapsedMs: number): string {
  return `Total time = ${toWholeSeconds(totalElapsedMs)} seconds`;
}

/**
 * Run the workload under the mode selected by `modeId` and write the total
 * time to the sink.
 *
 * @returns the run result, or `null` when `modeId` is unknown (nothing runs
 *   and nothing is written)
 */
export async function main(
  modeId: number,
  options: RunnerOptions = {}
): Promise<RunResult | null> {
  const mode = modeFromId(modeId);
  if (mode === null) {
    return null;
  }

  const sink = options.sink ?? new ConsoleSink();
  const units = (options.units ?? DEFAULT_WORKLOAD).map((spec) => new WorkUnit(spec));
  const scheduler = new Scheduler(sink, options.scheduler);

  const result = await scheduler.run(mode, units);
  await sink.write(formatTotalTime(result.totalElapsedMs));

  return result;
}
