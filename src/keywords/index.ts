/**
 * Keyword Extraction Module Exports
 *
 * @module keywords
 */

export { FrequencyKeywordExtractor, createKeywordExtractor } from './extractor.js';
