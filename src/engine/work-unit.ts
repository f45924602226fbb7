/**
 * Work Unit
 *
 * A named, simulated blocking operation with a fixed duration.
 *
 * @module breakfast-scheduler/engine/work-unit
 */

import { SchedulerError } from './errors.js';
import type { OutputGuard } from './output-guard.js';
import type { OutputSink, WorkUnitSpec } from './types.js';
import { sleep } from './utils.js';

/**
 * What a unit needs from the run that executes it
 */
export interface WorkUnitContext {
  /** Destination for the start/finish messages */
  sink: OutputSink;

  /**
   * Guard lent by the scheduler in synchronized mode. Only the start
   * message is written under it.
   */
  guard?: OutputGuard;
}

/**
 * Simulated unit of work ("make coffee", "make toast").
 *
 * `execute` writes `Creating {name}...`, suspends for `durationMs`, then
 * writes `Created {name}!`.
 */
export class WorkUnit {
  readonly name: string;
  readonly durationMs: number;

  constructor(spec: WorkUnitSpec) {
    if (spec.name.trim().length === 0) {
      throw SchedulerError.invalidUnit(spec.name, 'name must not be empty');
    }
    if (!Number.isInteger(spec.durationMs) || spec.durationMs < 0) {
      throw SchedulerError.invalidUnit(
        spec.name,
        `duration must be a non-negative integer, got ${spec.durationMs}`
      );
    }

    this.name = spec.name;
    this.durationMs = spec.durationMs;
  }

  get startMessage(): string {
    return `Creating ${this.name}...`;
  }

  get finishMessage(): string {
    return `Created ${this.name}!`;
  }

  async execute(context: WorkUnitContext): Promise<void> {
    const { sink, guard } = context;

    if (guard) {
      await guard.withLock(() => sink.write(this.startMessage));
    } else {
      await sink.write(this.startMessage);
    }

    await sleep(this.durationMs);

    await sink.write(this.finishMessage);
  }
}
