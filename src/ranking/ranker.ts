/**
 * Ranker
 *
 * Sorts scored rows by score descending and keeps the top N.
 *
 * @module ranking/ranker
 */

/**
 * Anything carrying a numeric score.
 */
export interface Scored {
  score: number;
}

/**
 * Sort rows by score descending without reordering ties.
 *
 * Array.prototype.sort is stable, so rows with equal scores keep the
 * relative order they had coming out of the previous stage.
 *
 * @param rows - Rows to sort
 * @returns New sorted array
 */
export function sortByScore<T extends Scored>(rows: readonly T[]): T[] {
  return [...rows].sort((a, b) => b.score - a.score);
}

/**
 * Sort by score descending, then keep the first `count` rows.
 *
 * @param rows - Filtered rows
 * @param count - Number of rows to keep; `<= 0` yields an empty list
 * @returns At most `count` rows
 */
export function rankAndTruncate<T extends Scored>(rows: readonly T[], count: number): T[] {
  if (count <= 0) {
    return [];
  }
  return sortByScore(rows).slice(0, count);
}
