/**
 * Signal Handlers
 *
 * Sets up process handlers for interruption and fatal errors.
 */

import { renderError } from '../renderer/output.js';
import { colors, icons } from '../renderer/colors.js';

/**
 * Setup process handlers. Runs cannot be cancelled, so an interrupt exits
 * immediately; uncaught failures are fatal.
 */
export function setupSignalHandlers(): void {
  // Handle SIGINT (Ctrl+C)
  process.on('SIGINT', () => {
    console.error(colors.warning(`\n${icons.warning} Received Ctrl+C, aborting run`));
    process.exit(130); // Standard exit code for SIGINT
  });

  // Handle SIGTERM (kill command)
  process.on('SIGTERM', () => {
    console.error(colors.warning(`\n${icons.warning} Received SIGTERM, aborting run`));
    process.exit(143); // Standard exit code for SIGTERM
  });

  process.on('uncaughtException', (error) => {
    console.error(renderError(error));
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    console.error(renderError(reason));
    process.exit(1);
  });
}
