/**
 * Scheduler
 *
 * Runs a set of work units sequentially or concurrently, joins them and
 * measures wall-clock time.
 *
 * @module breakfast-scheduler/engine/scheduler
 */

import { SchedulerError } from './errors.js';
import { OutputGuard } from './output-guard.js';
import type {
  ExecutionMode,
  OutputSink,
  RunResult,
  SchedulerLogger,
  SchedulerOptions,
  UnitTiming,
} from './types.js';
import { assertNever } from './utils.js';
import type { WorkUnit, WorkUnitContext } from './work-unit.js';

/**
 * Schedules work units under an {@link ExecutionMode}.
 *
 * Every concurrent run gets its own {@link OutputGuard}, so independent
 * runs in the same process never share a lock.
 *
 * @example
 * ```typescript
 * const scheduler = new Scheduler(new ConsoleSink());
 * const result = await scheduler.run('concurrent-synchronized', [
 *   new WorkUnit({ name: 'coffee', durationMs: 2000 }),
 *   new WorkUnit({ name: 'toast', durationMs: 3000 }),
 * ]);
 * // result.totalElapsedMs ≈ 3000
 * ```
 */
export class Scheduler {
  private options: Required<SchedulerOptions>;

  constructor(
    private sink: OutputSink,
    options: SchedulerOptions = {}
  ) {
    this.options = {
      maxConcurrent: options.maxConcurrent ?? 16,
      logger: options.logger ?? (() => {}),
    };
  }

  /**
   * Execution contexts available to a concurrent run
   */
  get capacity(): number {
    return this.options.maxConcurrent;
  }

  /**
   * Run every unit under `mode` and wait for all of them to finish.
   *
   * @throws SchedulerError RESOURCE_EXHAUSTED when a concurrent run needs
   *   more contexts than {@link capacity}; nothing is dispatched in that case
   */
  async run(mode: ExecutionMode, units: readonly WorkUnit[]): Promise<RunResult> {
    const log = this.options.logger;
    log(`run start: mode=${mode} units=${units.length}`);

    const timings: UnitTiming[] = units.map((unit) => ({
      name: unit.name,
      startedAtMs: 0,
      finishedAtMs: 0,
    }));

    let startTime: number;

    switch (mode) {
      case 'sequential':
        startTime = Date.now();
        await this.runSequential(units, timings, startTime);
        break;

      case 'concurrent-unsynchronized':
        this.reserveContexts(units.length);
        startTime = Date.now();
        await this.runConcurrent(units, timings, startTime, { sink: this.sink });
        break;

      case 'concurrent-synchronized':
        this.reserveContexts(units.length);
        startTime = Date.now();
        await this.runConcurrent(units, timings, startTime, {
          sink: this.sink,
          guard: new OutputGuard(),
        });
        break;

      default:
        return assertNever(mode);
    }

    const totalElapsedMs = Date.now() - startTime;
    log(`run joined: mode=${mode} elapsed=${totalElapsedMs}ms`);

    return { mode, totalElapsedMs, units: timings };
  }

  private async runSequential(
    units: readonly WorkUnit[],
    timings: UnitTiming[],
    startTime: number
  ): Promise<void> {
    const context: WorkUnitContext = { sink: this.sink };

    for (const [index, unit] of units.entries()) {
      await this.executeTimed(unit, context, timings[index], startTime);
    }
  }

  /**
   * Dispatch every unit, then join all handles. Each handle is awaited
   * exactly once; the first failure (in unit order) is rethrown only after
   * every unit has settled.
   */
  private async runConcurrent(
    units: readonly WorkUnit[],
    timings: UnitTiming[],
    startTime: number,
    context: WorkUnitContext
  ): Promise<void> {
    const handles = units.map((unit, index) =>
      this.executeTimed(unit, context, timings[index], startTime)
    );

    const settled = await Promise.allSettled(handles);

    for (const outcome of settled) {
      if (outcome.status === 'rejected') {
        throw outcome.reason;
      }
    }
  }

  private async executeTimed(
    unit: WorkUnit,
    context: WorkUnitContext,
    timing: UnitTiming,
    startTime: number
  ): Promise<void> {
    const log: SchedulerLogger = this.options.logger;

    timing.startedAtMs = Date.now() - startTime;
    log(`dispatch: ${unit.name} (${unit.durationMs}ms)`);

    await unit.execute(context);

    timing.finishedAtMs = Date.now() - startTime;
    log(`complete: ${unit.name} after ${timing.finishedAtMs}ms`);
  }

  private reserveContexts(requested: number): void {
    if (requested > this.options.maxConcurrent) {
      throw SchedulerError.resourceExhausted(requested, this.options.maxConcurrent);
    }
  }
}
