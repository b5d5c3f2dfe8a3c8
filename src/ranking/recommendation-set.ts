/**
 * RecommendationSet
 *
 * The scored subset of the corpus produced by one query invocation. Every
 * operation returns a new set; the rows of a set never change once built.
 *
 * Lifecycle:
 * ```
 * fromScores / fromRows -> removeOverlap -> filterYears -> rankAndTruncate
 * ```
 *
 * Presentation (CLI table) and export (CSV) live outside this class.
 *
 * @module ranking/recommendation-set
 */

import type { Document } from '../schemas/document.js';
import type { Recommendation } from '../schemas/recommendation.js';
import type { YearRange } from '../schemas/common.js';
import type { ScoreAggregation } from './scores.js';
import { removeOverlap, filterByYear, type Titled } from './filters.js';
import { rankAndTruncate } from './ranker.js';

export class RecommendationSet {
  private readonly rows: readonly Recommendation[];

  private constructor(rows: readonly Recommendation[]) {
    this.rows = rows;
  }

  // ==========================================================================
  // Factories
  // ==========================================================================

  /**
   * Materialize the corpus documents named by a ScoreMap.
   *
   * Rows come out in corpus order, deduplicated by title (first occurrence
   * wins), each scored `points / maxScore`. Titles absent from the corpus are
   * skipped.
   *
   * @param documents - Corpus documents
   * @param aggregation - Output of aggregateScores
   */
  static fromScores(
    documents: readonly Document[],
    aggregation: ScoreAggregation
  ): RecommendationSet {
    const { scores, maxScore } = aggregation;
    if (maxScore <= 0 || scores.size === 0) {
      return RecommendationSet.empty();
    }

    const seenTitles = new Set<string>();
    const rows: Recommendation[] = [];

    for (const document of documents) {
      const points = scores.get(document.title);
      if (points === undefined || seenTitles.has(document.title)) {
        continue;
      }
      seenTitles.add(document.title);
      rows.push({ ...document, score: points / maxScore });
    }

    return new RecommendationSet(rows);
  }

  /**
   * Wrap already-scored rows (author query, reloaded CSV).
   */
  static fromRows(rows: readonly Recommendation[]): RecommendationSet {
    return new RecommendationSet([...rows]);
  }

  static empty(): RecommendationSet {
    return new RecommendationSet([]);
  }

  // ==========================================================================
  // Operations
  // ==========================================================================

  /**
   * Drop rows whose title is already in the user's library.
   */
  removeOverlap(library: readonly Titled[]): RecommendationSet {
    return new RecommendationSet(removeOverlap(this.rows, library));
  }

  /**
   * Keep rows inside the inclusive year window.
   */
  filterYears(range: YearRange): RecommendationSet {
    return new RecommendationSet(filterByYear(this.rows, range));
  }

  /**
   * Stable sort by score descending, then keep the first `count` rows.
   */
  rankAndTruncate(count: number): RecommendationSet {
    return new RecommendationSet(rankAndTruncate(this.rows, count));
  }

  // ==========================================================================
  // Accessors
  // ==========================================================================

  get size(): number {
    return this.rows.length;
  }

  isEmpty(): boolean {
    return this.rows.length === 0;
  }

  titles(): string[] {
    return this.rows.map((row) => row.title);
  }

  toArray(): readonly Recommendation[] {
    return this.rows;
  }

  [Symbol.iterator](): Iterator<Recommendation> {
    return this.rows[Symbol.iterator]();
  }
}
