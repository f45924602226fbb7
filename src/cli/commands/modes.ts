/**
 * Modes Command
 *
 * Lists the execution modes the run command accepts.
 */

import type { Command } from 'commander';
import stripAnsi from 'strip-ansi';
import { MODE_DESCRIPTIONS, MODE_IDS } from '../../engine/runner.js';
import type { ExecutionMode } from '../../engine/types.js';
import { colors } from '../renderer/colors.js';

/**
 * Modes command options
 */
export interface ModesOptions {
  /**
   * Output format: 'table' (default) or 'json'
   */
  format?: 'table' | 'json';
}

/**
 * Mode information for display
 */
export interface ModeInfo {
  id: number;
  mode: ExecutionMode;
  description: string;
}

/**
 * Get all mode information, ordered by id
 */
export function getModeInfo(): ModeInfo[] {
  return Object.entries(MODE_IDS)
    .map(([id, mode]) => ({
      id: Number(id),
      mode,
      description: MODE_DESCRIPTIONS[mode],
    }))
    .sort((a, b) => a.id - b.id);
}

/**
 * Render modes in table format
 */
export function renderTable(modes: ModeInfo[], useColors = true): string {
  const idWidth = 2;
  const modeWidth = Math.max(10, ...modes.map((m) => m.mode.length));
  const descWidth = Math.max(30, ...modes.map((m) => m.description.length));

  // Pad by visible width so colored cells line up
  const pad = (text: string, width: number) =>
    text + ' '.repeat(Math.max(0, width - stripAnsi(text).length));

  const lines: string[] = [];

  lines.push('Execution Modes:');
  lines.push('');

  lines.push('┌─' + '─'.repeat(idWidth) + '─┬─' + '─'.repeat(modeWidth) + '─┬─' + '─'.repeat(descWidth) + '─┐');
  lines.push('│ ' + pad('Id', idWidth) + ' │ ' + pad('Mode', modeWidth) + ' │ ' + pad('Description', descWidth) + ' │');
  lines.push('├─' + '─'.repeat(idWidth) + '─┼─' + '─'.repeat(modeWidth) + '─┼─' + '─'.repeat(descWidth) + '─┤');

  for (const info of modes) {
    const mode = useColors ? colors.info(info.mode) : info.mode;
    lines.push('│ ' + pad(String(info.id), idWidth) + ' │ ' + pad(mode, modeWidth) + ' │ ' + pad(info.description, descWidth) + ' │');
  }

  lines.push('└─' + '─'.repeat(idWidth) + '─┴─' + '─'.repeat(modeWidth) + '─┴─' + '─'.repeat(descWidth) + '─┘');

  return lines.join('\n');
}

/**
 * Render modes in JSON format
 */
export function renderJson(modes: ModeInfo[]): string {
  return JSON.stringify(modes, null, 2);
}

/**
 * Modes command implementation
 */
export function modesCommand(options: ModesOptions = {}): string {
  const format = options.format || 'table';
  const modes = getModeInfo();

  if (format === 'json') {
    return renderJson(modes);
  }
  return renderTable(modes);
}

/**
 * Register modes command with Commander program
 */
export function registerModesCommand(program: Command): void {
  program
    .command('modes')
    .description('List available execution modes')
    .option('--format <format>', 'Output format: table or json', 'table')
    .action((options: ModesOptions) => {
      console.log(modesCommand(options));
    });
}
