#!/usr/bin/env node
/**
 * Bibliographic Recommender CLI
 *
 * Main entry point for the bibrec CLI tool.
 * Uses commander for command parsing and execution.
 *
 * Usage:
 *   bibrec --help
 *   bibrec suggest library.bib --since 2018
 *   bibrec query "contrastive learning for speech"
 *   bibrec author "Jane Doe" --library library.bib
 *
 * @module cli
 */

import { Command } from 'commander';
import { VERSION } from './version.js';
import { BaseCommand, EXIT_CODES, type GlobalOptions } from './base-command.js';
import { getCommandHelp, registerCommands } from './commands/index.js';

// ============================================================================
// Main Program Setup
// ============================================================================

/**
 * Create and configure the main CLI program.
 *
 * @returns Configured commander Program instance
 */
export function createProgram(): Command {
  const program = new Command();

  // Program metadata
  program
    .name('bibrec')
    .description('Bibliographic Recommender - Find related papers in a local corpus')
    .version(VERSION, '-V, --version', 'Display version number');

  // Global options (available to all commands)
  program
    .option('-v, --verbose', 'Enable verbose output for debugging')
    .option('-q, --quiet', 'Suppress all non-essential output')
    .option('--no-color', 'Disable colored output')
    .option('--corpus-dir <path>', 'Override corpus directory (~/.bibrec/corpus)');

  // Create base command helper with global options
  program.hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts<GlobalOptions>();
    const baseCommand = new BaseCommand(opts);

    // Store base command in program for subcommands to access
    thisCommand.setOptionValue('_baseCommand', baseCommand);

    // Validate mutually exclusive flags
    if (opts.verbose && opts.quiet) {
      baseCommand.error('Cannot use both --verbose and --quiet flags', EXIT_CODES.USAGE_ERROR);
    }
  });

  // Global error handling (set before subcommands so they inherit it)
  program.exitOverride((err) => {
    if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
      process.exit(EXIT_CODES.SUCCESS);
    }
    process.exit(EXIT_CODES.USAGE_ERROR);
  });

  // Register all subcommands
  registerCommands(program);

  const helpLines = getCommandHelp().map(
    ({ name, description }) => `  bibrec ${name.padEnd(20)} ${description}`
  );
  program.addHelpText('after', ['', 'Query modes:', ...helpLines].join('\n'));

  return program;
}

/**
 * Main CLI entry point.
 * Parses arguments and executes the appropriate command.
 */
export async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    // Error already handled by commander or base command
    if (error instanceof Error && error.message) {
      console.error(`Error: ${error.message}`);
    }
    process.exit(EXIT_CODES.ERROR);
  }
}

// Run if executed directly
if (require.main === module) {
  void main();
}
