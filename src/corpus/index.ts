/**
 * Corpus Module Exports
 *
 * @module corpus
 */

export { createCorpus, mergeAbstracts, loadCorpus } from './store.js';
