/**
 * Shared Command Helpers
 *
 * Corpus loading with a spinner, progress wiring, result presentation and
 * CSV export used by every query command.
 *
 * @module cli/commands/shared
 */

import type { BaseCommand, ExitCode } from '../base-command.js';
import { ProgressSpinner, SpinnerProgressReporter } from '../formatters/progress.js';
import {
  formatAuthorSummary,
  formatKeywordSummary,
  formatRecommendationTable,
  formatWarning,
} from '../formatters/recommendations.js';
import { loadCorpus } from '../../corpus/store.js';
import { topKeywords } from '../../ranking/keywords.js';
import { saveRecommendationsCsv } from '../../storage/recommendations.js';
import { resolveUserPath } from '../../storage/paths.js';
import { NOOP_PROGRESS, type Corpus, type ProgressReporter } from '../../pipeline/types.js';
import type { RecommendationResult } from '../../pipeline/recommend.js';
import { isFatalLoadError } from '../../errors/index.js';
import { OptionsError, type QueryOptions } from './options.js';

/** Authors listed in the summary line */
const AUTHOR_SUMMARY_LIMIT = 5;

// ============================================================================
// Loading
// ============================================================================

/**
 * Load the corpus from the command's corpus directory, behind a spinner.
 *
 * @param base - Base command for output
 * @returns Loaded corpus
 */
export async function loadCorpusForCommand(base: BaseCommand): Promise<Corpus> {
  const spinner = base.isQuiet() ? null : new ProgressSpinner('Loading corpus...').start();

  try {
    const corpus = await loadCorpus(base.corpusDir, base.toLogger());
    spinner?.succeed(`Loaded ${corpus.documents.length} documents`);
    return corpus;
  } catch (error) {
    spinner?.fail('Failed to load corpus');
    throw error;
  }
}

/**
 * Progress reporter that can also mark the running step as failed.
 */
export type CommandProgress = ProgressReporter & { fail(): void };

/**
 * Progress reporter for a command: a spinner, or nothing in quiet mode.
 */
export function createCommandProgress(base: BaseCommand): CommandProgress {
  if (base.isQuiet()) {
    return { ...NOOP_PROGRESS, fail: () => undefined };
  }
  return new SpinnerProgressReporter(new ProgressSpinner(''));
}

// ============================================================================
// Presentation
// ============================================================================

/**
 * Print recommendations, summaries and warnings, and export when asked.
 *
 * @param base - Base command for output
 * @param result - Pipeline result
 * @param options - Validated command options
 */
export async function presentResult(
  base: BaseCommand,
  result: RecommendationResult,
  options: QueryOptions
): Promise<void> {
  const missing = result.warnings.filter((warning) => warning.kind === 'no_candidates');
  if (missing.length > 0 && result.mode !== 'authors') {
    base.warn(`${missing.length} of ${result.queryCount} queries returned no candidates`);
  }
  for (const warning of missing) {
    base.debug(formatWarning(warning));
  }

  const rows = result.recommendations.toArray();
  if (rows.length > 0) {
    const keywords = topKeywords(result.keywords, options.keywords).map((k) => k.keyword);

    base.section(`Recommendations (${rows.length})`);
    for (const line of formatRecommendationTable(rows, keywords)) {
      base.print(line);
    }

    const keywordLine = formatKeywordSummary(result.keywords, options.keywords);
    if (keywordLine) {
      base.blank();
      base.keyValue('Keywords', keywordLine);
    }

    const authorLine = formatAuthorSummary(result.authors, AUTHOR_SUMMARY_LIMIT);
    if (authorLine) {
      base.keyValue('Top authors', authorLine);
    }
  }

  if (options.output) {
    const outputPath = resolveUserPath(options.output);
    await saveRecommendationsCsv(result.recommendations, outputPath);
    base.success(`Saved ${rows.length} recommendations to ${outputPath}`);
  }
}

/**
 * Print an error and exit with the matching code. Stack traces of
 * unexpected errors are shown in verbose mode.
 *
 * @param base - Base command for output
 * @param error - Caught error
 * @param exitCode - Exit code for the error
 */
export function failCommand(base: BaseCommand, error: unknown, exitCode: ExitCode): never {
  const expected = isFatalLoadError(error) || error instanceof OptionsError;
  if (!expected && error instanceof Error && error.stack) {
    base.debug(error.stack);
  }
  const message = error instanceof Error ? error.message : String(error);
  return base.error(message, exitCode);
}
