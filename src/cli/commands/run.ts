/**
 * Run Command
 *
 * Runs the breakfast workload under the mode selected by id and reports the
 * total time.
 */

import { InvalidArgumentError, type Command } from 'commander';
import { DEFAULT_WORKLOAD, main, modeFromId } from '../../engine/runner.js';
import type { OutputSink, RunResult, WorkUnitSpec } from '../../engine/types.js';
import { ConsoleSink } from '../../output/sinks.js';
import { setupSignalHandlers } from '../lifecycle/signals.js';
import { renderDiagnostic, renderError, renderHeader } from '../renderer/output.js';

/**
 * Options for the run command
 */
export interface RunOptions {
  /** Workload override; defaults to coffee and toast */
  unit?: WorkUnitSpec[];

  /** Write console lines in chunks of this many characters */
  chunkSize?: number;

  /** Scheduler capacity */
  maxConcurrent?: number;

  /** Show the boxed header (default: true) */
  banner?: boolean;

  /** Print scheduler diagnostics to stderr (default: false) */
  verbose?: boolean;
}

/**
 * Parse a non-negative integer option value
 */
export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError(`Expected a non-negative integer, got "${value}".`);
  }
  return parsed;
}

/**
 * Parse the mode id argument
 */
export function parseModeId(value: string): number {
  const parsed = Number(value);
  if (!/^-?\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError(`Mode must be an integer, got "${value}".`);
  }
  return parsed;
}

/**
 * Parse a `name:ms` unit option and append it to the previous values
 */
export function parseUnit(value: string, previous: WorkUnitSpec[] = []): WorkUnitSpec[] {
  const separator = value.lastIndexOf(':');
  if (separator <= 0) {
    throw new InvalidArgumentError(`Expected <name:ms>, got "${value}".`);
  }

  const name = value.slice(0, separator);
  const durationMs = parseNonNegativeInt(value.slice(separator + 1));

  return [...previous, { name, durationMs }];
}

/**
 * Run command implementation
 *
 * @returns the run result, or `null` for an unknown mode id
 */
export async function runCommand(
  modeId: number,
  options: RunOptions = {},
  sink: OutputSink = new ConsoleSink({ chunkSize: options.chunkSize }),
): Promise<RunResult | null> {
  const mode = modeFromId(modeId);
  const units = options.unit ?? [...DEFAULT_WORKLOAD];

  if (mode !== null && (options.banner ?? true)) {
    console.log(renderHeader({ modeId, mode, units }));
  }

  return main(modeId, {
    sink,
    units,
    scheduler: {
      maxConcurrent: options.maxConcurrent,
      logger: options.verbose
        ? (message) => console.error(renderDiagnostic(message))
        : undefined,
    },
  });
}

/**
 * Register run command with Commander program
 */
export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run the breakfast workload (1 = sequential, 2 = concurrent, 3 = concurrent with guarded output)')
    .argument('[mode]', 'Mode id', parseModeId, 3)
    .option('--unit <name:ms>', 'Work unit to run (repeatable, replaces the default workload)', parseUnit)
    .option('--chunk-size <n>', 'Write console lines in chunks of n characters', parseNonNegativeInt)
    .option('--max-concurrent <n>', 'Execution contexts available to concurrent runs', parseNonNegativeInt)
    .option('--no-banner', 'Hide the run header')
    .option('--verbose', 'Print scheduler diagnostics to stderr', false)
    .action(async (modeId: number, options: RunOptions) => {
      setupSignalHandlers();
      try {
        await runCommand(modeId, options);
        process.exit(0);
      } catch (error) {
        console.error(renderError(error));
        process.exit(1);
      }
    });
}
