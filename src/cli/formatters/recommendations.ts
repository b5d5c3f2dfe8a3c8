/**
 * Recommendation Formatters
 *
 * Renders a RecommendationSet as a terminal table, with the keyword profile
 * terms highlighted in titles, and the keyword and author summaries printed
 * after it.
 *
 * @module cli/formatters/recommendations
 */

import chalk from 'chalk';
import type { Recommendation } from '../../schemas/recommendation.js';
import type { EmptyResultWarning } from '../../pipeline/types.js';
import { topKeywords, type KeywordProfile } from '../../ranking/keywords.js';
import { topAuthors, type AuthorProfile } from '../../ranking/authors.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Wraps a matched keyword for display.
 */
export type Highlighter = (text: string) => string;

const defaultHighlighter: Highlighter = (text) => chalk.bold.yellow(text);

/** Column widths of the recommendation table */
const COLUMNS = {
  rank: 5,
  score: 8,
  year: 6,
  title: 60,
  authors: 32,
} as const;

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Truncate a string to a maximum length.
 *
 * @param str - String to truncate
 * @param maxLen - Maximum length
 * @returns Truncated string
 */
export function truncate(str: string, maxLen: number): string {
  if (str.length <= maxLen) return str;
  return str.slice(0, maxLen - 3) + '...';
}

/**
 * Pad a string to a fixed width.
 *
 * @param str - String to pad
 * @param width - Target width
 * @returns Padded string
 */
export function padRight(str: string, width: number): string {
  // Account for ANSI codes by calculating visible length
  const visibleLength = str.replace(/\x1b\[[0-9;]*m/g, '').length;
  const padding = Math.max(0, width - visibleLength);
  return str + ' '.repeat(padding);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Highlight every occurrence of the given keywords in a text.
 *
 * Matching is case-insensitive on whole words; words of a multi-word keyword
 * may be separated by any whitespace or hyphen. Longer keywords win where
 * matches overlap.
 *
 * @param text - Text to decorate
 * @param keywords - Normalized keywords
 * @param highlight - Decoration applied to each match
 *
 * @example
 * ```typescript
 * highlightKeywords('Graph Neural Networks', ['neural networks'], (s) => `[${s}]`);
 * // "Graph [Neural Networks]"
 * ```
 */
export function highlightKeywords(
  text: string,
  keywords: readonly string[],
  highlight: Highlighter = defaultHighlighter
): string {
  const alternatives = keywords
    .filter((keyword) => keyword.trim().length > 0)
    .sort((a, b) => b.length - a.length)
    .map((keyword) => keyword.trim().split(/\s+/).map(escapeRegExp).join('[\\s-]+'));

  if (alternatives.length === 0) {
    return text;
  }

  // Word boundaries that also hold for accented letters and non-Latin scripts
  const pattern = new RegExp(
    `(?<![\\p{L}\\p{N}])(?:${alternatives.join('|')})(?![\\p{L}\\p{N}])`,
    'giu'
  );
  return text.replace(pattern, (match) => highlight(match));
}

// ============================================================================
// Table
// ============================================================================

/**
 * Format table header.
 */
function formatTableHeader(): string {
  const header =
    padRight('#', COLUMNS.rank) +
    padRight('SCORE', COLUMNS.score) +
    padRight('YEAR', COLUMNS.year) +
    padRight('TITLE', COLUMNS.title) +
    'AUTHORS';

  return chalk.bold(header);
}

/**
 * Format one recommendation as a table row.
 *
 * @param row - Recommendation to format
 * @param rank - 1-based display rank
 * @param keywords - Keywords to highlight in the title
 * @param highlight - Keyword decoration
 */
export function formatTableRow(
  row: Recommendation,
  rank: number,
  keywords: readonly string[] = [],
  highlight: Highlighter = defaultHighlighter
): string {
  const title = highlightKeywords(truncate(row.title, COLUMNS.title - 2), keywords, highlight);
  return (
    padRight(String(rank), COLUMNS.rank) +
    padRight(row.score.toFixed(3), COLUMNS.score) +
    padRight(String(row.year), COLUMNS.year) +
    padRight(title, COLUMNS.title) +
    truncate(row.authors.join(', ') || '-', COLUMNS.authors)
  );
}

/**
 * Format recommendations as a table.
 *
 * @param rows - Recommendations in display order
 * @param keywords - Keywords to highlight in titles
 * @returns Table lines, header first
 */
export function formatRecommendationTable(
  rows: readonly Recommendation[],
  keywords: readonly string[] = []
): string[] {
  const width = COLUMNS.rank + COLUMNS.score + COLUMNS.year + COLUMNS.title + COLUMNS.authors;
  return [
    formatTableHeader(),
    chalk.dim('-'.repeat(width)),
    ...rows.map((row, index) => formatTableRow(row, index + 1, keywords)),
  ];
}

// ============================================================================
// Summaries
// ============================================================================

/**
 * Format the heaviest keywords of a profile.
 *
 * @example
 * ```typescript
 * formatKeywordSummary(new Map([['graph', 12], ['neural networks', 8]]), 10);
 * // "graph (12), neural networks (8)"
 * ```
 */
export function formatKeywordSummary(profile: KeywordProfile, limit: number): string {
  return topKeywords(profile, limit)
    .map(({ keyword, score }) => `${keyword} (${score})`)
    .join(', ');
}

/**
 * Format the most frequent authors of a recommendation set.
 *
 * @example
 * ```typescript
 * formatAuthorSummary(profile, 5); // "Jane Doe (3), Richard Roe (1)"
 * ```
 */
export function formatAuthorSummary(profile: AuthorProfile, limit: number): string {
  return topAuthors(profile, limit)
    .map(({ name, count }) => `${name} (${count})`)
    .join(', ');
}

/**
 * Describe an empty-result warning.
 */
export function formatWarning(warning: EmptyResultWarning): string {
  switch (warning.kind) {
    case 'no_candidates':
      return `Could not find any candidates for: "${warning.query}"`;
    case 'no_recommendations':
      return 'No recommendations remain after filtering. Try a wider year range or a larger count.';
  }
}
