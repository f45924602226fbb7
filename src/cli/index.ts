#!/usr/bin/env node

import { Command } from "commander";
import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { dirname, join } from "path";
import { registerRunCommand } from "./commands/run.js";
import { registerModesCommand } from "./commands/modes.js";

// Get package.json for version
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJsonPath = join(__dirname, "..", "..", "package.json");
const packageJson: { version: string } = JSON.parse(readFileSync(packageJsonPath, "utf-8"));

// Create CLI program
export const program = new Command();

program
  .name("breakfast")
  .description(
    "Breakfast Scheduler - sequential vs. concurrent task execution demo"
  )
  .version(packageJson.version);

// Register commands
registerRunCommand(program);
registerModesCommand(program);

// Global error handler
program.configureOutput({
  outputError: (str: string, write: (str: string) => void) => {
    // Color error messages red
    write(`\x1b[31m${str}\x1b[0m`);
  },
});

// Handle unknown commands
program.on("command:*", (operands: string[]) => {
  console.error(`\x1b[31mError: Unknown command '${operands[0]}'\x1b[0m`);
  console.error("\nRun 'breakfast --help' to see available commands.");
  process.exit(1);
});

// Main function to run CLI (only if executed directly)
export function runCli(argv: string[] = process.argv): void {
  // Show help if no command specified
  if (!argv.slice(2).length) {
    program.outputHelp();
    return;
  }

  // Parse arguments and execute
  program.parse(argv);
}

// Only run if this module is executed directly (not imported)
if (import.meta.url === `file://${process.argv[1]}`) {
  runCli();
}
