#!/usr/bin/env node
/**
 * Court Harvest CLI
 *
 * Main entry point for the courts CLI tool.
 * Uses commander for command parsing and execution.
 *
 * Usage:
 *   courts --help
 *   courts run --max-enrich 100
 *   courts status
 *   courts queries --pending
 *
 * @module cli
 */

import { Command } from 'commander';
import { VERSION } from './version.js';
import { BaseCommand, EXIT_CODES, type GlobalOptions } from './base-command.js';
import { registerCommands } from './commands/index.js';

// ============================================================================
// Main Program Setup
// ============================================================================

/**
 * Create and configure the main CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('courts')
    .description('Fetch pickleball courts from Google Places and publish them as JSON')
    .version(VERSION, '-V, --version', 'Display version number');

  // Global options (available to all commands)
  program
    .option('-v, --verbose', 'Enable verbose output for debugging')
    .option('-q, --quiet', 'Suppress all non-essential output')
    .option('--no-color', 'Disable colored output');

  program.hook('preAction', (thisCommand) => {
    const opts: GlobalOptions = thisCommand.opts();
    const baseCommand = new BaseCommand(opts);

    // Store base command in program for subcommands to access
    thisCommand.setOptionValue('_baseCommand', baseCommand);

    if (opts.verbose && opts.quiet) {
      baseCommand.fatal('Cannot use both --verbose and --quiet flags', EXIT_CODES.USAGE_ERROR);
    }
  });

  registerCommands(program);

  return program;
}

/**
 * Main CLI entry point.
 * Parses arguments and executes the appropriate command.
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();
  await program.parseAsync(argv);
}

// Run if executed directly
if (require.main === module) {
  main().catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`Error: ${message}`);
    process.exit(EXIT_CODES.ERROR);
  });
}
