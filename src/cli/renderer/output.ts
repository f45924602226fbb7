/**
 * Output Renderer
 *
 * Formats run headers and diagnostic lines for terminal display.
 */

import boxen from 'boxen';
import { MODE_DESCRIPTIONS } from '../../engine/runner.js';
import type { RenderOptions, RunHeader } from './types.js';
import { colors, icons } from './colors.js';

/**
 * Format duration in milliseconds to human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = (ms / 1000).toFixed(1);
  return `${seconds}s`;
}

/**
 * Render run header in a bordered box
 */
export function renderHeader(header: RunHeader): string {
  const lines: string[] = [];

  lines.push(colors.info(`Running program ${header.modeId}...`));
  lines.push(colors.dim(`Mode: ${header.mode} (${MODE_DESCRIPTIONS[header.mode]})`));

  for (const unit of header.units) {
    lines.push(colors.dim(`  ${unit.name}: ${formatDuration(unit.durationMs)}`));
  }

  return boxen(lines.join('\n'), {
    padding: { top: 0, bottom: 0, left: 1, right: 1 },
    margin: 0,
    borderStyle: 'round',
    borderColor: 'cyan',
  });
}

/**
 * Render a scheduler diagnostic line
 */
export function renderDiagnostic(message: string, options: RenderOptions = {}): string {
  const { useColors = true } = options;
  const line = `${icons.info} ${message}`;
  return useColors ? colors.dim(line) : line;
}

/**
 * Render an error line
 */
export function renderError(error: unknown, options: RenderOptions = {}): string {
  const { useColors = true } = options;
  const message = error instanceof Error ? error.message : String(error);
  const line = `${icons.error} ${message}`;
  return useColors ? colors.error(line) : line;
}
