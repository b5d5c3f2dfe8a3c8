/**
 * Frequency Keyword Extractor
 *
 * Scores single words and two-word phrases of an abstract by how often they
 * occur, weighting phrases by their length. Phrases never cross punctuation
 * or stop words.
 *
 * Formula:
 * ```
 * score(term) = occurrences(term) × words(term)
 * ```
 * Ties keep first-occurrence order.
 *
 * @module keywords/extractor
 */

import type { KeywordExtractor } from '../pipeline/types.js';
import { isContentWord, splitPhrases } from '../text/tokenize.js';

export class FrequencyKeywordExtractor implements KeywordExtractor {
  /**
   * Extract up to `limit` keywords, most representative first.
   *
   * @param text - Source text (usually an abstract)
   * @param limit - Maximum number of keywords
   */
  extract(text: string, limit: number): string[] {
    if (limit <= 0) {
      return [];
    }

    const scores = new Map<string, number>();
    const add = (term: string, weight: number) => {
      scores.set(term, (scores.get(term) ?? 0) + weight);
    };

    for (const words of splitPhrases(text)) {
      words.forEach((word, i) => {
        if (!isContentWord(word)) {
          return;
        }
        add(word, 1);
        const previous = i > 0 ? words[i - 1] : undefined;
        if (previous !== undefined && isContentWord(previous)) {
          add(`${previous} ${word}`, 2);
        }
      });
    }

    return [...scores.entries()]
      .sort((a, b) => b[1] - a[1])
      .slice(0, limit)
      .map(([term]) => term);
  }
}

/**
 * Create the default keyword extractor.
 */
export function createKeywordExtractor(): KeywordExtractor {
  return new FrequencyKeywordExtractor();
}
