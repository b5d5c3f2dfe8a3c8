/**
 * Author Matching and Aggregation
 *
 * One normalization function serves both the author-filter query and the
 * author frequency summary, so both compare names the same way.
 *
 * @module ranking/authors
 */

import type { Document } from '../schemas/document.js';
import type { Recommendation } from '../schemas/recommendation.js';

// ============================================================================
// Normalization
// ============================================================================

/**
 * Punctuation stripped from author names before comparison.
 */
const AUTHOR_PUNCTUATION = /[.,;:'"()[\]{}]/g;

/**
 * Normalize an author name for comparison.
 * Case-folds, strips a fixed punctuation set and collapses whitespace.
 *
 * @example
 * ```typescript
 * normalizeAuthorName('Hinton, Geoffrey E.') // "hinton geoffrey e"
 * normalizeAuthorName('  O\'Neil,  C. ')     // "oneil c"
 * ```
 */
export function normalizeAuthorName(name: string): string {
  return name.toLowerCase().replace(AUTHOR_PUNCTUATION, '').replace(/\s+/g, ' ').trim();
}

/**
 * Normalize a list of names into a set, dropping names that normalize to nothing.
 */
export function normalizeAuthorSet(names: readonly string[]): Set<string> {
  const normalized = new Set<string>();
  for (const name of names) {
    const key = normalizeAuthorName(name);
    if (key.length > 0) {
      normalized.add(key);
    }
  }
  return normalized;
}

// ============================================================================
// Author-Filter Query
// ============================================================================

/**
 * Select documents written by any of the given authors.
 *
 * Each kept document is scored by the share of distinct query names it
 * matches, which keeps the score in (0, 1]. Documents are deduplicated by
 * title (first occurrence wins) and returned in corpus order.
 *
 * @param documents - Corpus documents
 * @param names - Author names to look for
 * @returns Matching documents as scored recommendations
 */
export function filterByAuthors(
  documents: readonly Document[],
  names: readonly string[]
): Recommendation[] {
  const wanted = normalizeAuthorSet(names);
  if (wanted.size === 0) {
    return [];
  }

  const seenTitles = new Set<string>();
  const matches: Recommendation[] = [];

  for (const document of documents) {
    if (seenTitles.has(document.title)) {
      continue;
    }

    const authors = normalizeAuthorSet(document.authors);
    let matched = 0;
    for (const name of wanted) {
      if (authors.has(name)) {
        matched++;
      }
    }

    if (matched > 0) {
      seenTitles.add(document.title);
      matches.push({ ...document, score: matched / wanted.size });
    }
  }

  return matches;
}

// ============================================================================
// Author Aggregation
// ============================================================================

/**
 * Occurrence count of one author, displayed under the first spelling seen.
 */
export interface AuthorTally {
  name: string;
  count: number;
}

/**
 * Author frequency table keyed by normalized name.
 */
export type AuthorProfile = Map<string, AuthorTally>;

/**
 * Count how many recommended documents each author appears on.
 * An author listed twice on one document counts once for it.
 *
 * @param recommendations - Final recommendation rows
 * @returns Author profile in first-seen order
 */
export function aggregateAuthors(
  recommendations: readonly Pick<Document, 'authors'>[]
): AuthorProfile {
  const profile: AuthorProfile = new Map();

  for (const recommendation of recommendations) {
    const countedHere = new Set<string>();
    for (const author of recommendation.authors) {
      const key = normalizeAuthorName(author);
      if (key.length === 0 || countedHere.has(key)) {
        continue;
      }
      countedHere.add(key);

      const tally = profile.get(key);
      if (tally) {
        tally.count++;
      } else {
        profile.set(key, { name: author.trim(), count: 1 });
      }
    }
  }

  return profile;
}

/**
 * Top contributing authors, by count descending (ties: first seen first).
 *
 * @param profile - Author profile
 * @param limit - Maximum number of authors
 */
export function topAuthors(profile: AuthorProfile, limit: number): AuthorTally[] {
  if (limit <= 0) {
    return [];
  }
  return [...profile.values()].sort((a, b) => b.count - a.count).slice(0, limit);
}
