/**
 * Base Command
 *
 * Provides common functionality for all CLI commands including:
 * - Global option handling (verbose, quiet, no-color, corpus directory)
 * - Consistent error handling and exit codes
 * - Output utilities (log, warn, error)
 * - A pipeline Logger backed by the same output
 *
 * @module cli/base-command
 */

import chalk from 'chalk';
import { config } from '../config/index.js';
import { resolveUserPath } from '../storage/paths.js';
import type { Logger } from '../pipeline/types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Global CLI options available to all commands.
 */
export type GlobalOptions = {
  /** Enable verbose output for debugging */
  verbose?: boolean;
  /** Suppress all non-essential output */
  quiet?: boolean;
  /** Disable colored output */
  color?: boolean; // commander inverts --no-color to color: false
  /** Override the corpus directory */
  corpusDir?: string;
};

// ============================================================================
// Exit Codes
// ============================================================================

/**
 * Standard exit codes for the CLI.
 */
export const EXIT_CODES = {
  /** Successful execution */
  SUCCESS: 0,
  /** General error (including inconsistent corpus data) */
  ERROR: 1,
  /** Invalid usage or arguments */
  USAGE_ERROR: 2,
  /** Library file or corpus file not found */
  NOT_FOUND: 3,
  /** User cancelled operation */
  CANCELLED: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// ============================================================================
// BaseCommand Class
// ============================================================================

/**
 * Base command class providing common CLI functionality.
 *
 * All command handlers should receive a BaseCommand instance
 * to access consistent logging, error handling, and options.
 *
 * @example
 * ```typescript
 * async function suggestHandler(library: string, options: SuggestOptions, cmd: Command) {
 *   const base = getBaseCommand(cmd);
 *
 *   base.info(`Loading library: ${library}`);
 *
 *   try {
 *     const result = await runSuggest(library, options, base);
 *     base.success(`${result.recommendations.size} recommendations`);
 *   } catch (err) {
 *     base.error('Suggestion failed', exitCodeFor(err));
 *   }
 * }
 * ```
 */
export class BaseCommand {
  /** Global options from CLI */
  readonly options: GlobalOptions;

  /** Whether colored output is enabled */
  private readonly useColor: boolean;

  /** Resolved corpus directory path */
  readonly corpusDir: string;

  /**
   * Create a new BaseCommand instance.
   *
   * @param options - Global CLI options
   */
  constructor(options: GlobalOptions) {
    this.options = options;
    this.useColor = options.color !== false && process.stdout.isTTY === true;
    this.corpusDir = options.corpusDir ? resolveUserPath(options.corpusDir) : config.corpusDir;

    // Configure chalk based on color preference
    if (!this.useColor) {
      chalk.level = 0;
    }
  }

  // ==========================================================================
  // Output Methods
  // ==========================================================================

  /**
   * Log a debug message (only visible in verbose mode).
   *
   * @param message - Message to log
   * @param args - Additional arguments to log
   */
  debug(message: string, ...args: unknown[]): void {
    if (this.options.verbose) {
      console.log(chalk.dim(`[DEBUG] ${message}`), ...args);
    }
  }

  /**
   * Log an informational message (hidden in quiet mode).
   *
   * @param message - Message to log
   * @param args - Additional arguments to log
   */
  info(message: string, ...args: unknown[]): void {
    if (!this.options.quiet) {
      console.log(message, ...args);
    }
  }

  /**
   * Log a warning message (always visible).
   *
   * @param message - Warning message
   * @param args - Additional arguments to log
   */
  warn(message: string, ...args: unknown[]): void {
    console.warn(chalk.yellow(`Warning: ${message}`), ...args);
  }

  /**
   * Log an error message and exit.
   *
   * @param message - Error message
   * @param errorOrCode - Error object or exit code
   */
  error(message: string, errorOrCode?: Error | ExitCode): never {
    console.error(chalk.red(`Error: ${message}`));

    if (errorOrCode instanceof Error) {
      if (this.options.verbose) {
        console.error(chalk.dim(errorOrCode.stack ?? errorOrCode.message));
      }
      process.exit(EXIT_CODES.ERROR);
    } else if (typeof errorOrCode === 'number') {
      process.exit(errorOrCode);
    } else {
      process.exit(EXIT_CODES.ERROR);
    }
  }

  /**
   * Log a success message with green checkmark.
   *
   * @param message - Success message
   */
  success(message: string): void {
    if (!this.options.quiet) {
      console.log(chalk.green(`${this.useColor ? '✔' : '[OK]'} ${message}`));
    }
  }

  /**
   * Print a blank line (hidden in quiet mode).
   */
  blank(): void {
    if (!this.options.quiet) {
      console.log();
    }
  }

  /**
   * Print a section header.
   *
   * @param title - Section title
   */
  section(title: string): void {
    if (!this.options.quiet) {
      console.log();
      console.log(chalk.bold(title));
      console.log(chalk.dim('='.repeat(title.length)));
    }
  }

  /**
   * Print a line of command output. Shown even in quiet mode: it is the
   * result the user asked for.
   *
   * @param line - Line to print
   */
  print(line: string): void {
    console.log(line);
  }

  /**
   * Print a key-value pair.
   *
   * @param key - Label
   * @param value - Value to display
   */
  keyValue(key: string, value: string | number): void {
    if (!this.options.quiet) {
      console.log(`${chalk.dim(key + ':')} ${value}`);
    }
  }

  // ==========================================================================
  // Pipeline Integration
  // ==========================================================================

  /**
   * Logger for pipeline stages, routed through this command's output.
   * Unlike `error()`, the logger's error method never exits.
   */
  toLogger(): Logger {
    return {
      debug: (message, ...args) => this.debug(message, ...args),
      info: (message, ...args) => this.info(message, ...args),
      warn: (message, ...args) => this.warn(message, ...args),
      error: (message, ...args) => console.error(chalk.red(`Error: ${message}`), ...args),
    };
  }

  // ==========================================================================
  // Utility Methods
  // ==========================================================================

  /**
   * Check if quiet mode is enabled.
   */
  isQuiet(): boolean {
    return this.options.quiet === true;
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Get the base command from a commander Command instance.
 * Used by subcommand handlers to access shared functionality.
 *
 * @param cmd - Commander command instance (the program or a subcommand)
 * @returns BaseCommand stored by the program's preAction hook
 */
export function getBaseCommand(cmd: { optsWithGlobals(): Record<string, unknown> }): BaseCommand {
  const base = cmd.optsWithGlobals()['_baseCommand'];
  if (!(base instanceof BaseCommand)) {
    // Create a default one if not available (for testing)
    return new BaseCommand({});
  }
  return base;
}
