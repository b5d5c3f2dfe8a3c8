/**
 * Candidate Filters
 *
 * Overlap exclusion against the user's library and the inclusive
 * publication-year window. Both run before truncation so that a filtered-out
 * document can never occupy one of the top-N slots.
 *
 * @module ranking/filters
 */

import type { YearRange } from '../schemas/common.js';

/**
 * Anything with a title; library entries and documents both qualify.
 */
export interface Titled {
  title: string;
}

/**
 * Anything with a publication year.
 */
export interface Dated {
  year: number;
}

/**
 * Remove rows whose title exactly matches a title in the library.
 *
 * Matching is exact and case-sensitive, the same key used for aggregation.
 *
 * @param rows - Candidate rows
 * @param library - The user's library entries
 * @returns Rows not present in the library, order preserved
 */
export function removeOverlap<T extends Titled>(
  rows: readonly T[],
  library: readonly Titled[]
): T[] {
  if (library.length === 0) {
    return [...rows];
  }
  const owned = new Set(library.map((entry) => entry.title));
  return rows.filter((row) => !owned.has(row.title));
}

/**
 * Keep rows with `since <= year <= to`. Omitted bounds are ignored.
 *
 * @param rows - Candidate rows
 * @param range - Inclusive year window
 * @returns Rows inside the window, order preserved (possibly empty)
 *
 * @example
 * ```typescript
 * filterByYear(rows, { since: 2015, to: 2019 });
 * filterByYear(rows, { since: 2018 }); // 2018 onwards
 * ```
 */
export function filterByYear<T extends Dated>(rows: readonly T[], range: YearRange): T[] {
  const { since, to } = range;
  return rows.filter(
    (row) => (since === undefined || row.year >= since) && (to === undefined || row.year <= to)
  );
}
