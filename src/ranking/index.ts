/**
 * Ranking Module Exports
 *
 * Central export point for the recommendation aggregation engine.
 *
 * @module ranking
 */

// Score aggregation
export {
  MIN_RANK_WEIGHT,
  rankWeight,
  scoreCandidates,
  accumulateScores,
  aggregateScores,
  type ScoreMap,
  type ScoreQuery,
  type ScoreAggregation,
} from './scores.js';

// Filters
export { removeOverlap, filterByYear, type Titled, type Dated } from './filters.js';

// Ranking and truncation
export { sortByScore, rankAndTruncate, type Scored } from './ranker.js';

// Recommendation set
export { RecommendationSet } from './recommendation-set.js';

// Keyword aggregation
export {
  aggregateKeywords,
  topKeywords,
  type KeywordProfile,
  type KeywordSource,
  type WeightedKeyword,
} from './keywords.js';

// Author matching and aggregation
export {
  normalizeAuthorName,
  normalizeAuthorSet,
  filterByAuthors,
  aggregateAuthors,
  topAuthors,
  type AuthorTally,
  type AuthorProfile,
} from './authors.js';
