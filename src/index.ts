/**
 * Bibliographic Recommender
 *
 * Library entry point. The CLI lives in ./cli.
 *
 * @example
 * ```typescript
 * import { loadCorpus, loadUserLibrary, TfidfRetriever, recommendFromLibrary } from 'bibrec';
 *
 * const corpus = await loadCorpus('/data/corpus');
 * const library = await loadUserLibrary('library.bib');
 * const result = recommendFromLibrary(
 *   { corpus, retriever: new TfidfRetriever(corpus.documents) },
 *   library,
 *   { count: 20, since: 2018 }
 * );
 * ```
 *
 * @module bibrec
 */

export * from './errors/index.js';
export * from './schemas/index.js';
export * from './pipeline/index.js';
export * from './ranking/index.js';
export * from './text/index.js';
export * from './keywords/index.js';
export * from './retrieval/index.js';
export * from './corpus/index.js';
export * from './library/index.js';
export * from './storage/index.js';
