/**
 * Query Command
 *
 * Recommends corpus documents for a free-text query.
 *
 * Usage:
 *   bibrec query graph neural networks for molecules
 *   bibrec query "sparse attention" --since 2020 -n 10
 *
 * @module cli/commands/query
 */

import type { Command } from 'commander';
import { getBaseCommand, type BaseCommand } from '../base-command.js';
import { config } from '../../config/index.js';
import { TfidfRetriever } from '../../retrieval/tfidf.js';
import { createKeywordExtractor } from '../../keywords/extractor.js';
import { recommendFromText, type RecommendationResult } from '../../pipeline/recommend.js';
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
 * Run the query command.
 *
 * @param words - Query words, joined with spaces
 * @param rawOptions - Options from commander
 * @param base - Base command for output
 * @returns Pipeline result (already printed)
 */
export async function runQuery(
  words: readonly string[],
  rawOptions: RawQueryOptions,
  base: BaseCommand
): Promise<RecommendationResult> {
  const options = parseQueryOptions(rawOptions);
  const text = words.join(' ').trim();
  if (text.length === 0) {
    throw new OptionsError('Query text must not be empty');
  }

  const corpus = await loadCorpusForCommand(base);
  const retriever = new TfidfRetriever(corpus.documents);

  const progress = createCommandProgress(base);
  let result: RecommendationResult;
  try {
    result = recommendFromText(
      {
        corpus,
        retriever,
        keywordExtractor: createKeywordExtractor(),
        logger: base.toLogger(),
        progress,
      },
      text,
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
 * Register the query command.
 *
 * @param program - Commander program instance
 */
export function registerQueryCommand(program: Command): void {
  program
    .command('query <text...>')
    .description('Recommend documents matching a free-text query')
    .option('-n, --count <n>', 'Number of recommendations', '20')
    .option('--since <year>', 'Earliest publication year (inclusive)')
    .option('--to <year>', 'Latest publication year (inclusive)')
    .option('-k, --keywords <n>', 'Number of keywords to show and highlight', '10')
    .option('-o, --output <path>', 'Save recommendations as CSV')
    .action(async (words: string[], options: RawQueryOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);

      try {
        await runQuery(words, options, base);
      } catch (error) {
        failCommand(base, error, exitCodeFor(error));
      }
    });
}
