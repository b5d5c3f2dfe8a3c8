/**
 * Suggest Command
 *
 * Recommends corpus documents for the user's library: every library entry
 * becomes one retrieval query and the candidate lists are combined by
 * Borda count.
 *
 * Usage:
 *   bibrec suggest library.bib
 *   bibrec suggest library.json -n 50 --since 2018 -o suggestions.csv
 *
 * @module cli/commands/suggest
 */

import type { Command } from 'commander';
import { getBaseCommand, type BaseCommand } from '../base-command.js';
import { config } from '../../config/index.js';
import { loadUserLibrary } from '../../library/loader.js';
import { resolveUserPath } from '../../storage/paths.js';
import { TfidfRetriever } from '../../retrieval/tfidf.js';
import { createKeywordExtractor } from '../../keywords/extractor.js';
import { recommendFromLibrary, type RecommendationResult } from '../../pipeline/recommend.js';
import { exitCodeFor, parseQueryOptions, type RawQueryOptions } from './options.js';
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
 * Run the suggest command.
 *
 * @param libraryPath - Path to a .bib or .json library
 * @param rawOptions - Options from commander
 * @param base - Base command for output
 * @returns Pipeline result (already printed)
 */
export async function runSuggest(
  libraryPath: string,
  rawOptions: RawQueryOptions,
  base: BaseCommand
): Promise<RecommendationResult> {
  const options = parseQueryOptions(rawOptions);
  const logger = base.toLogger();

  const library = await loadUserLibrary(resolveUserPath(libraryPath), logger);
  base.info(`Library: ${library.length} entries`);

  const corpus = await loadCorpusForCommand(base);
  const retriever = new TfidfRetriever(corpus.documents);
  base.debug(`Indexed ${retriever.size} documents`);

  const progress = createCommandProgress(base);
  let result: RecommendationResult;
  try {
    result = recommendFromLibrary(
      { corpus, retriever, keywordExtractor: createKeywordExtractor(), logger, progress },
      library,
      {
        count: options.count,
        since: options.since,
        to: options.to,
        perQueryLimit: config.limits.suggestionsPerPaper,
        keywordsPerEntry: config.limits.keywordsPerPaper,
      }
    );
  } catch (error) {
    progress.fail();
    throw error;
  }

  await presentResult(base, result, options);
  return result;
}

// ============================================================================
// Command Registration
// ============================================================================

/**
 * Register the suggest command.
 *
 * @param program - Commander program instance
 */
export function registerSuggestCommand(program: Command): void {
  program
    .command('suggest <library>')
    .description('Recommend documents related to a library (.bib or .json)')
    .option('-n, --count <n>', 'Number of recommendations', '20')
    .option('--since <year>', 'Earliest publication year (inclusive)')
    .option('--to <year>', 'Latest publication year (inclusive)')
    .option('-k, --keywords <n>', 'Number of keywords to show and highlight', '10')
    .option('-o, --output <path>', 'Save recommendations as CSV')
    .action(async (library: string, options: RawQueryOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);

      try {
        await runSuggest(library, options, base);
      } catch (error) {
        failCommand(base, error, exitCodeFor(error));
      }
    });
}
