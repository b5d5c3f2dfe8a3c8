/**
 * Score Aggregation
 *
 * Borda-count voting across retrieval queries. Each query returns a ranked
 * CandidateList; the candidate at rank r earns `limit - r` points, and points
 * for the same document title are summed across all queries.
 *
 * Formula:
 * ```
 * weight(r) = max(MIN_RANK_WEIGHT, limit - r)
 * score(title) = Σ over queries of weight(best rank of title in that query)
 * maxScore = Σ over queries of limit
 * ```
 *
 * Documents surfaced frequently and ranked highly across many queries
 * accumulate more than documents surfaced once at the top.
 *
 * @module ranking/scores
 */

import type { CandidateRetriever, Corpus, StageHooks } from '../pipeline/types.js';

// ============================================================================
// Constants
// ============================================================================

/**
 * Floor for a single rank weight. Keeps contributions positive when a
 * retriever returns more candidates than the requested bound.
 */
export const MIN_RANK_WEIGHT = 1;

// ============================================================================
// Types
// ============================================================================

/**
 * Accumulated score per document title.
 */
export type ScoreMap = Map<string, number>;

/**
 * One retrieval query.
 */
export interface ScoreQuery {
  /** Text handed to the retriever */
  text: string;
  /** Result bound K for this query */
  limit: number;
  /** Label used in logs and warnings (defaults to a prefix of the text) */
  label?: string;
}

/**
 * Result of aggregating a set of queries.
 */
export interface ScoreAggregation {
  /** Summed rank weights per title */
  scores: ScoreMap;
  /** Normalization denominator: sum of every contributing query's limit */
  maxScore: number;
  /** Number of queries that contributed */
  queryCount: number;
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Weight of a candidate at a 0-indexed rank.
 *
 * @param limit - Result bound K of the query
 * @param rank - 0-indexed position in the CandidateList
 * @returns `limit - rank`, floored at MIN_RANK_WEIGHT
 *
 * @example
 * ```typescript
 * rankWeight(100, 0); // 100
 * rankWeight(100, 99); // 1
 * rankWeight(3, 7); // 1
 * ```
 */
export function rankWeight(limit: number, rank: number): number {
  return Math.max(MIN_RANK_WEIGHT, limit - rank);
}

/**
 * Short label for a query text, for logs.
 */
function labelFor(query: ScoreQuery): string {
  if (query.label) {
    return query.label;
  }
  const text = query.text.trim();
  return text.length > 60 ? `${text.slice(0, 57)}...` : text;
}

// ============================================================================
// Core Functions
// ============================================================================

/**
 * Turn one CandidateList into title -> weight points.
 *
 * Identifiers resolve to titles immediately. Ids unknown to the corpus are
 * dropped. A title surfacing twice in the same list (duplicate titles under
 * different ids) keeps its best rank only, so a single query never awards
 * more than `limit` to one title.
 *
 * @param candidateIds - Ordered ids returned by the retriever
 * @param limit - Result bound K of the query
 * @param corpus - Corpus used to resolve ids
 * @param hooks - Optional logger
 * @returns Points per title for this query
 */
export function scoreCandidates(
  candidateIds: readonly string[],
  limit: number,
  corpus: Corpus,
  hooks: Pick<StageHooks, 'logger'> = {}
): ScoreMap {
  const points: ScoreMap = new Map();

  if (candidateIds.length > limit) {
    hooks.logger?.debug(
      `[scores] Retriever returned ${candidateIds.length} candidates for limit ${limit}, ignoring the excess`
    );
  }

  const considered = candidateIds.slice(0, Math.max(0, limit));
  let unmatched = 0;

  considered.forEach((id, rank) => {
    const document = corpus.byId.get(id);
    if (!document) {
      unmatched++;
      return;
    }
    if (!points.has(document.title)) {
      points.set(document.title, rankWeight(limit, rank));
    }
  });

  if (unmatched > 0) {
    hooks.logger?.debug(`[scores] Dropped ${unmatched} candidate id(s) not found in corpus`);
  }

  return points;
}

/**
 * Add a query's points into an accumulating ScoreMap.
 * Unseen titles are initialised; existing entries only grow.
 *
 * @param target - ScoreMap to update in place
 * @param points - Points from a single query
 */
export function accumulateScores(target: ScoreMap, points: ScoreMap): void {
  for (const [title, value] of points) {
    target.set(title, (target.get(title) ?? 0) + value);
  }
}

/**
 * Aggregate scores over a sequence of queries.
 *
 * Each query is sent to the retriever with its own limit. An empty
 * CandidateList is logged and recorded as a `no_candidates` warning; it still
 * counts as a contributing query so that the normalization denominator stays
 * `K × number of queries`.
 *
 * @param queries - Queries to run, in order
 * @param retriever - Candidate retriever
 * @param corpus - Corpus used to resolve ids to titles
 * @param hooks - Logger, progress reporter and warning collector
 * @returns Aggregated scores with their normalization denominator
 */
export function aggregateScores(
  queries: readonly ScoreQuery[],
  retriever: CandidateRetriever,
  corpus: Corpus,
  hooks: StageHooks = {}
): ScoreAggregation {
  const scores: ScoreMap = new Map();
  let maxScore = 0;

  queries.forEach((query, index) => {
    const candidateIds = retriever.predict(query.text, query.limit);

    if (candidateIds.length === 0) {
      const label = labelFor(query);
      hooks.logger?.debug(`[scores] Could not find any candidates for: "${label}"`);
      hooks.warnings?.push({ kind: 'no_candidates', query: label });
    }

    accumulateScores(scores, scoreCandidates(candidateIds, query.limit, corpus, hooks));
    maxScore += query.limit;

    hooks.progress?.advance(index + 1, queries.length);
  });

  return {
    scores,
    maxScore,
    queryCount: queries.length,
  };
}
