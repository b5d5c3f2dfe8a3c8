/**
 * CLI Formatters
 *
 * Re-exports all CLI formatting utilities.
 *
 * @module cli/formatters
 */

// Progress display utilities
export {
  ProgressSpinner,
  SpinnerProgressReporter,
  formatDuration,
  type SpinnerOptions,
} from './progress.js';

// Recommendation output
export {
  truncate,
  padRight,
  highlightKeywords,
  formatTableRow,
  formatRecommendationTable,
  formatKeywordSummary,
  formatAuthorSummary,
  formatWarning,
  type Highlighter,
} from './recommendations.js';
