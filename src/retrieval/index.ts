/**
 * Retrieval Module Exports
 *
 * @module retrieval
 */

export { TfidfRetriever, type ScoredCandidate } from './tfidf.js';
