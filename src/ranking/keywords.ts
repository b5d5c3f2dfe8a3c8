/**
 * Keyword Aggregation
 *
 * Builds a rank-weighted keyword profile for a set of library entries, the
 * same way document scores are built: the keyword at rank r of an entry's
 * extraction earns `perEntryLimit - r`, and repeats across entries add up.
 *
 * The profile is informational (summary and highlighting); it never feeds
 * back into document scoring.
 *
 * @module ranking/keywords
 */

import type { KeywordExtractor, StageHooks } from '../pipeline/types.js';
import { rankWeight } from './scores.js';

/**
 * Accumulated weight per keyword, in first-seen order.
 */
export type KeywordProfile = Map<string, number>;

/**
 * Minimal entry shape needed for extraction.
 */
export interface KeywordSource {
  title: string;
  abstract: string;
}

/**
 * A keyword with its accumulated weight.
 */
export interface WeightedKeyword {
  keyword: string;
  score: number;
}

/**
 * Aggregate keywords across library entries.
 *
 * Entries with an empty abstract fall back to their title.
 *
 * @param entries - Library entries (or a single free-text query)
 * @param perEntryLimit - Keywords extracted per entry
 * @param extractor - Keyword extractor
 * @param hooks - Optional logger and progress reporter
 * @returns Keyword profile
 */
export function aggregateKeywords(
  entries: readonly KeywordSource[],
  perEntryLimit: number,
  extractor: KeywordExtractor,
  hooks: Pick<StageHooks, 'logger' | 'progress'> = {}
): KeywordProfile {
  const profile: KeywordProfile = new Map();

  entries.forEach((entry, index) => {
    const text = entry.abstract.trim().length > 0 ? entry.abstract : entry.title;
    const keywords = extractor.extract(text, perEntryLimit).slice(0, perEntryLimit);

    if (keywords.length === 0) {
      hooks.logger?.debug(`[keywords] No keywords extracted for: "${entry.title}"`);
    }

    keywords.forEach((keyword, rank) => {
      profile.set(keyword, (profile.get(keyword) ?? 0) + rankWeight(perEntryLimit, rank));
    });

    hooks.progress?.advance(index + 1, entries.length);
  });

  return profile;
}

/**
 * Highest-weighted keywords (ties: first seen first).
 *
 * @param profile - Keyword profile
 * @param limit - Maximum number of keywords
 */
export function topKeywords(profile: KeywordProfile, limit: number): WeightedKeyword[] {
  if (limit <= 0) {
    return [];
  }
  return [...profile.entries()]
    .map(([keyword, score]) => ({ keyword, score }))
    .sort((a, b) => b.score - a.score)
    .slice(0, limit);
}
