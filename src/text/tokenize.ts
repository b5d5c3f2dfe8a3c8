/**
 * Text Tokenization
 *
 * Shared by the TF-IDF retriever and the keyword extractor so both see the
 * same vocabulary.
 *
 * @module text/tokenize
 */

import stopWordList from './stopwords.json';

/**
 * English stop words plus boilerplate common to abstracts ("propose", "results").
 */
export const STOP_WORDS: ReadonlySet<string> = new Set(stopWordList);

/**
 * Shortest word considered meaningful.
 */
const MIN_WORD_LENGTH = 3;

/**
 * Lowercase and replace every run of non-letter, non-digit characters with a space.
 *
 * @example
 * ```typescript
 * normalizeText('Self-Supervised  Learning!') // "self supervised learning"
 * ```
 */
export function normalizeText(text: string): string {
  return text.toLowerCase().replace(/[^\p{L}\p{N}]+/gu, ' ').trim();
}

/**
 * Check whether a normalized word carries meaning on its own.
 */
export function isContentWord(word: string): boolean {
  return word.length >= MIN_WORD_LENGTH && !STOP_WORDS.has(word) && !/^\d+$/.test(word);
}

/**
 * Split text into content words, in order.
 *
 * @example
 * ```typescript
 * tokenize('We propose a model of the visual cortex') // ["model", "visual", "cortex"]
 * ```
 */
export function tokenize(text: string): string[] {
  const normalized = normalizeText(text);
  if (normalized.length === 0) {
    return [];
  }
  return normalized.split(' ').filter(isContentWord);
}

/**
 * Split text into phrases at sentence and clause punctuation, each phrase a
 * list of normalized words (stop words kept so callers can see adjacency).
 *
 * @example
 * ```typescript
 * splitPhrases('Deep learning, at scale.') // [["deep", "learning"], ["at", "scale"]]
 * ```
 */
export function splitPhrases(text: string): string[][] {
  return text
    .split(/[.,;:!?()[\]{}"\n]+/)
    .map((chunk) => normalizeText(chunk))
    .filter((chunk) => chunk.length > 0)
    .map((chunk) => chunk.split(' '));
}
