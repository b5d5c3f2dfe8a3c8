/**
 * Text Utilities
 *
 * @module text
 */

export { STOP_WORDS, normalizeText, isContentWord, tokenize, splitPhrases } from './tokenize.js';
