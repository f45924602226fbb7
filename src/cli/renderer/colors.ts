/**
 * Color Scheme and Icons
 *
 * Defines the visual style for CLI diagnostics and headers.
 */

import chalk from 'chalk';

/**
 * Color functions for each message kind
 */
export const colors = {
  error: chalk.red,
  info: chalk.cyan,
  warning: chalk.yellow,
  dim: chalk.dim,
};

/**
 * Icons for each message kind (no emojis, using ASCII symbols)
 */
export const icons = {
  error: '[ERR]',
  info: '[i]',
  warning: '[!]',
};
