/**
 * CLI module index
 * Main entry point for the CLI interface
 */

import { Command } from 'commander';
import { createRequire } from 'node:module';
import { createRulesCommand, createScanCommand } from './commands/index.js';
import { printError } from './output.js';

// Re-export
export * from './output.js';
export * from './commands/index.js';

/**
 * Package version - read from package.json
 */
const require = createRequire(import.meta.url);
const packageJson: { version: string } = require('../../package.json');
export const VERSION: string = packageJson.version;

/**
 * Create the main CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('sourcescan')
    .description('Security scanning of source trees with rule patterns and model-assisted analysis')
    .version(VERSION)
    .option('--no-color', 'Disable colored output');

  program.addCommand(createScanCommand());
  program.addCommand(createRulesCommand());

  return program;
}

/**
 * Run the CLI
 */
export async function runCLI(args: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(args);
  } catch (error) {
    printError(error instanceof Error ? error.message : 'Unknown error');
    process.exit(1);
  }
}
