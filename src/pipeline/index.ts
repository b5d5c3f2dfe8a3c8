/**
 * Recommendation Pipeline
 *
 * Query orchestration over a loaded corpus, plus the observer and
 * collaborator contracts shared with the ranking engine.
 *
 * @module pipeline
 */

// Type definitions and constants
export {
  type Logger,
  type ProgressReporter,
  type CandidateRetriever,
  type KeywordExtractor,
  type Corpus,
  type EmptyResultWarning,
  type StageHooks,
  NOOP_PROGRESS,
} from './types.js';

// Query modes
export {
  DEFAULT_RECOMMEND_OPTIONS,
  recommendFromLibrary,
  recommendFromText,
  recommendByAuthors,
  type RecommendDependencies,
  type RecommendOptions,
  type RecommendationResult,
} from './recommend.js';
