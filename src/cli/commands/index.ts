/**
 * CLI Commands Registry
 *
 * Registers all available CLI commands with the main program.
 * Each command is implemented in its own file and registered here.
 *
 * Available commands:
 * - suggest: Recommend documents for a library
 * - query: Recommend documents for a free-text query
 * - author: List documents by the given authors
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerSuggestCommand } from './suggest.js';
import { registerQueryCommand } from './query.js';
import { registerAuthorCommand } from './author.js';

/**
 * Register all CLI commands with the program.
 *
 * @param program - Commander program instance
 */
export function registerCommands(program: Command): void {
  registerSuggestCommand(program);
  registerQueryCommand(program);
  registerAuthorCommand(program);
}

/**
 * Get help text for all available commands.
 *
 * @returns Array of command help entries
 */
export function getCommandHelp(): Array<{ name: string; description: string }> {
  return [
    { name: 'suggest <library>', description: 'Recommend documents related to a library' },
    { name: 'query <text...>', description: 'Recommend documents matching a free-text query' },
    { name: 'author <names...>', description: 'List documents written by the given authors' },
  ];
}
