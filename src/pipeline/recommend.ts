/**
 * Recommendation Pipeline
 *
 * Runs the three query modes over a loaded corpus:
 *
 * - **library**: one retrieval per library entry, Borda-count aggregation,
 *   then overlap exclusion, year window, rank and truncate.
 * - **text**: one retrieval for a free-text query, then year window, rank
 *   and truncate.
 * - **authors**: author-filter selection (no retrieval), then overlap
 *   exclusion against an optional library, year window, rank and truncate.
 *
 * Every mode also returns the author summary of its final set; the library
 * and text modes return a keyword profile of their input.
 *
 * The pipeline is synchronous: the corpus, retriever and library are loaded
 * by the caller beforehand.
 *
 * @module pipeline/recommend
 */

import type { UserLibraryEntry } from '../schemas/library.js';
import type { YearRange } from '../schemas/common.js';
import { aggregateScores, type ScoreQuery } from '../ranking/scores.js';
import { RecommendationSet } from '../ranking/recommendation-set.js';
import { aggregateKeywords, type KeywordProfile } from '../ranking/keywords.js';
import { aggregateAuthors, filterByAuthors, type AuthorProfile } from '../ranking/authors.js';
import type { Titled } from '../ranking/filters.js';
import {
  NOOP_PROGRESS,
  type CandidateRetriever,
  type Corpus,
  type EmptyResultWarning,
  type KeywordExtractor,
  type Logger,
  type ProgressReporter,
} from './types.js';

// ============================================================================
// Constants
// ============================================================================

/**
 * Defaults for recommendation options.
 */
export const DEFAULT_RECOMMEND_OPTIONS = {
  /** Recommendations returned */
  count: 20,
  /** Candidates retrieved per query (K) */
  perQueryLimit: 100,
  /** Keywords extracted per library entry */
  keywordsPerEntry: 20,
} as const;

// ============================================================================
// Types
// ============================================================================

/**
 * Collaborators and observers for one pipeline invocation.
 */
export interface RecommendDependencies {
  corpus: Corpus;
  /** Required by the library and text modes */
  retriever?: CandidateRetriever;
  /** When absent, no keyword profile is built */
  keywordExtractor?: KeywordExtractor;
  logger?: Logger;
  progress?: ProgressReporter;
}

/**
 * Options shared by every query mode.
 */
export interface RecommendOptions extends YearRange {
  /** Number of recommendations (N) */
  count?: number;
  /** Candidates retrieved per query (K) */
  perQueryLimit?: number;
  /** Keywords extracted per library entry */
  keywordsPerEntry?: number;
}

/**
 * Everything a query invocation produces.
 */
export interface RecommendationResult {
  mode: 'library' | 'text' | 'authors';
  recommendations: RecommendationSet;
  /** Keyword profile of the input (empty for author queries) */
  keywords: KeywordProfile;
  /** Author frequency of the final recommendations */
  authors: AuthorProfile;
  /** Non-fatal empty-result conditions met along the way */
  warnings: EmptyResultWarning[];
  /** Number of retrieval queries that contributed */
  queryCount: number;
}

// ============================================================================
// Helper Functions
// ============================================================================

function requireRetriever(deps: RecommendDependencies): CandidateRetriever {
  if (!deps.retriever) {
    throw new Error('A candidate retriever is required for retrieval-based recommendations');
  }
  return deps.retriever;
}

/**
 * Overlap, year window, rank and truncate, then summarize.
 */
function finalize(
  mode: RecommendationResult['mode'],
  candidates: RecommendationSet,
  library: readonly Titled[],
  options: RecommendOptions,
  context: {
    deps: RecommendDependencies;
    keywords: KeywordProfile;
    warnings: EmptyResultWarning[];
    queryCount: number;
  }
): RecommendationResult {
  const { deps, keywords, warnings, queryCount } = context;
  const logger = deps.logger;
  const progress = deps.progress ?? NOOP_PROGRESS;
  const count = options.count ?? DEFAULT_RECOMMEND_OPTIONS.count;

  progress.stage('Filtering and ranking');

  const withoutOverlap = candidates.removeOverlap(library);
  if (withoutOverlap.size < candidates.size) {
    logger?.debug(
      `[recommend] Removed ${candidates.size - withoutOverlap.size} document(s) already in the library`
    );
  }

  const inRange = withoutOverlap.filterYears({ since: options.since, to: options.to });
  if (inRange.size < withoutOverlap.size) {
    logger?.debug(
      `[recommend] Removed ${withoutOverlap.size - inRange.size} document(s) outside the year range`
    );
  }

  const recommendations = inRange.rankAndTruncate(count);

  if (recommendations.isEmpty()) {
    logger?.warn('No recommendations left after filtering');
    warnings.push({ kind: 'no_recommendations' });
  } else {
    logger?.debug(`[recommend] Kept ${recommendations.size} of ${candidates.size} candidates`);
  }

  const authors = aggregateAuthors(recommendations.toArray());
  progress.done();

  return { mode, recommendations, keywords, authors, warnings, queryCount };
}

// ============================================================================
// Query Modes
// ============================================================================

/**
 * Recommend documents for a user's library.
 *
 * @param deps - Corpus, retriever and optional extractor/observers
 * @param library - The user's library entries
 * @param options - Count, year window and per-query limits
 * @returns Final recommendations, keyword profile and author summary
 *
 * @example
 * ```typescript
 * const result = recommendFromLibrary({ corpus, retriever }, library, { count: 20, since: 2018 });
 * console.log(result.recommendations.titles());
 * ```
 */
export function recommendFromLibrary(
  deps: RecommendDependencies,
  library: readonly UserLibraryEntry[],
  options: RecommendOptions = {}
): RecommendationResult {
  const retriever = requireRetriever(deps);
  const progress = deps.progress ?? NOOP_PROGRESS;
  const limit = options.perQueryLimit ?? DEFAULT_RECOMMEND_OPTIONS.perQueryLimit;
  const warnings: EmptyResultWarning[] = [];

  deps.logger?.debug(`[recommend] Getting suggestions for ${library.length} library entries`);

  let keywords: KeywordProfile = new Map();
  if (deps.keywordExtractor) {
    progress.stage('Extracting keywords');
    keywords = aggregateKeywords(
      library,
      options.keywordsPerEntry ?? DEFAULT_RECOMMEND_OPTIONS.keywordsPerEntry,
      deps.keywordExtractor,
      { logger: deps.logger, progress }
    );
  }

  progress.stage('Finding matches');
  const queries: ScoreQuery[] = library.map((entry) => ({
    text: entry.abstract.trim().length > 0 ? entry.abstract : entry.title,
    limit,
    label: entry.title,
  }));
  const aggregation = aggregateScores(queries, retriever, deps.corpus, {
    logger: deps.logger,
    progress,
    warnings,
  });

  const candidates = RecommendationSet.fromScores(deps.corpus.documents, aggregation);

  return finalize('library', candidates, library, options, {
    deps,
    keywords,
    warnings,
    queryCount: aggregation.queryCount,
  });
}

/**
 * Recommend documents for a free-text query.
 *
 * @param deps - Corpus, retriever and optional extractor/observers
 * @param text - Query text
 * @param options - Count, year window and per-query limit
 */
export function recommendFromText(
  deps: RecommendDependencies,
  text: string,
  options: RecommendOptions = {}
): RecommendationResult {
  const retriever = requireRetriever(deps);
  const progress = deps.progress ?? NOOP_PROGRESS;
  const limit = options.perQueryLimit ?? DEFAULT_RECOMMEND_OPTIONS.perQueryLimit;
  const warnings: EmptyResultWarning[] = [];

  let keywords: KeywordProfile = new Map();
  if (deps.keywordExtractor) {
    progress.stage('Extracting keywords');
    keywords = aggregateKeywords(
      [{ title: text, abstract: text }],
      options.keywordsPerEntry ?? DEFAULT_RECOMMEND_OPTIONS.keywordsPerEntry,
      deps.keywordExtractor,
      { logger: deps.logger }
    );
  }

  progress.stage('Finding matches');
  const aggregation = aggregateScores([{ text, limit, label: 'query' }], retriever, deps.corpus, {
    logger: deps.logger,
    progress,
    warnings,
  });

  const candidates = RecommendationSet.fromScores(deps.corpus.documents, aggregation);

  return finalize('text', candidates, [], options, {
    deps,
    keywords,
    warnings,
    queryCount: aggregation.queryCount,
  });
}

/**
 * Recommend documents written by any of the given authors.
 *
 * @param deps - Corpus and optional observers (no retriever needed)
 * @param names - Author names
 * @param options - Count and year window
 * @param library - Optional library whose titles are excluded
 */
export function recommendByAuthors(
  deps: RecommendDependencies,
  names: readonly string[],
  options: RecommendOptions = {},
  library: readonly Titled[] = []
): RecommendationResult {
  const progress = deps.progress ?? NOOP_PROGRESS;
  const warnings: EmptyResultWarning[] = [];

  progress.stage('Matching authors');
  const matches = filterByAuthors(deps.corpus.documents, names);

  if (matches.length === 0) {
    const label = names.join(', ');
    deps.logger?.debug(`[recommend] No documents found for authors: ${label}`);
    warnings.push({ kind: 'no_candidates', query: label });
  }

  return finalize('authors', RecommendationSet.fromRows(matches), library, options, {
    deps,
    keywords: new Map(),
    warnings,
    queryCount: 0,
  });
}
