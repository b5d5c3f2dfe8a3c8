/**
 * Author Command
 *
 * Lists corpus documents written by any of the given authors. Documents
 * already in an optional library are left out.
 *
 * Usage:
 *   bibrec author "Jane Doe" "Richard Roe"
 *   bibrec author "Doe, Jane" --library library.bib --since 2015
 *
 * @module cli/commands/author
 */

import type { Command } from 'commander';
import { getBaseCommand, type BaseCommand } from '../base-command.js';
import { loadUserLibrary } from '../../library/loader.js';
import { resolveUserPath } from '../../storage/paths.js';
import { recommendByAuthors, type RecommendationResult } from '../../pipeline/recommend.js';
import type { UserLibraryEntry } from '../../schemas/library.js';
import { exitCodeFor, OptionsError, parseQueryOptions, type RawQueryOptions } from './options.js';
import {
  createCommandProgress,
  failCommand,
  loadCorpusForCommand,
  presentResult,
} from './shared.js';

// ============================================================================
// Handler
// ============================================================================

/**
 * Run the author command.
 *
 * @param names - Author names
 * @param rawOptions - Options from commander
 * @param base - Base command for output
 * @returns Pipeline result (already printed)
 */
export async function runAuthor(
  names: readonly string[],
  rawOptions: RawQueryOptions,
  base: BaseCommand
): Promise<RecommendationResult> {
  const options = parseQueryOptions(rawOptions);
  const authors = names.map((name) => name.trim()).filter((name) => name.length > 0);
  if (authors.length === 0) {
    throw new OptionsError('At least one author name is required');
  }

  let library: UserLibraryEntry[] = [];
  if (options.library) {
    library = await loadUserLibrary(resolveUserPath(options.library), base.toLogger());
    base.info(`Library: ${library.length} entries`);
  }

  const corpus = await loadCorpusForCommand(base);

  const progress = createCommandProgress(base);
  let result: RecommendationResult;
  try {
    result = recommendByAuthors(
      { corpus, logger: base.toLogger(), progress },
      authors,
      { count: options.count, since: options.since, to: options.to },
      library
    );
  } catch (error) {
    progress.fail();
    throw error;
  }

  if (result.recommendations.isEmpty() && result.warnings.some((w) => w.kind === 'no_candidates')) {
    base.info(`No documents found for: ${authors.join(', ')}`);
  }

  await presentResult(base, result, options);
  return result;
}

// ============================================================================
// Command Registration
// ============================================================================

/**
 * Register the author command.
 *
 * @param program - Commander program instance
 */
export function registerAuthorCommand(program: Command): void {
  program
    .command('author <names...>')
    .description('List documents written by any of the given authors')
    .option('-n, --count <n>', 'Number of recommendations', '20')
    .option('--since <year>', 'Earliest publication year (inclusive)')
    .option('--to <year>', 'Latest publication year (inclusive)')
    .option('-l, --library <path>', 'Exclude documents already in this library')
    .option('-o, --output <path>', 'Save recommendations as CSV')
    .action(async (names: string[], options: RawQueryOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);

      try {
        await runAuthor(names, options, base);
      } catch (error) {
        failCommand(base, error, exitCodeFor(error));
      }
    });
}
