/**
 * Renderer Types
 *
 * Type definitions for the CLI output renderer.
 */

import type { ExecutionMode, WorkUnitSpec } from '../../engine/types.js';

/**
 * Header information shown before a run
 */
export interface RunHeader {
  /** Mode id as given on the command line */
  modeId: number;

  /** Mode the id maps to */
  mode: ExecutionMode;

  /** Workload about to run */
  units: readonly WorkUnitSpec[];
}

/**
 * Rendering options for diagnostics
 */
export interface RenderOptions {
  /**
   * Whether to use colors in output
   * @default true
   */
  useColors?: boolean;
}
