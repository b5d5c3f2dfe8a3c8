/**
 * Tests for the TF-IDF candidate retriever
 *
 * @module retrieval/tfidf.test
 */

import { describe, it, expect } from '@jest/globals';
import type { Document } from '../schemas/document.js';
import { TfidfRetriever } from './tfidf.js';

function doc(id: string, title: string, abstract: string): Document {
  return { id, title, year: 2020, authors: [], abstract };
}

const documents = [
  doc('a', 'Protein folding', 'Predicting protein structure.'),
  doc('b', 'Speech recognition', 'Acoustic models for speech.'),
  doc('c', 'Protein speech', ''),
];

describe('TfidfRetriever', () => {
  const retriever = new TfidfRetriever(documents);

  it('should index every document', () => {
    expect(retriever.size).toBe(3);
  });

  it('should rank documents sharing more query terms first', () => {
    expect(retriever.predict('protein folding', 10)).toEqual(['a', 'c']);
  });

  it('should only return documents sharing a term with the query', () => {
    expect(retriever.predict('acoustic models', 10)).toEqual(['b']);
  });

  it('should honour the limit', () => {
    expect(retriever.predict('protein folding', 1)).toEqual(['a']);
    expect(retriever.predict('protein folding', 0)).toEqual([]);
  });

  it('should return nothing when no query term is indexed', () => {
    expect(retriever.predict('zebra', 10)).toEqual([]);
    expect(retriever.predict('the of and', 10)).toEqual([]);
    expect(retriever.predict('', 10)).toEqual([]);
  });

  it('should report similarities in descending order', () => {
    const results = retriever.search('protein folding', 10);
    expect(results).toHaveLength(2);
    expect(results[0].similarity).toBeGreaterThan(results[1].similarity);
    expect(results[1].similarity).toBeGreaterThan(0);
  });

  it('should give a query identical to a document a similarity of 1', () => {
    const single = new TfidfRetriever([doc('x', 'Sparse attention', 'sparse attention')]);
    const [result] = single.search('sparse attention', 1);
    expect(result.id).toBe('x');
    expect(result.similarity).toBeCloseTo(1, 10);
  });

  it('should break similarity ties by corpus order', () => {
    const twins = new TfidfRetriever([
      doc('first', 'Graph kernels', 'Kernels on graphs.'),
      doc('second', 'Graph kernels', 'Kernels on graphs.'),
      doc('other', 'Molecules', 'Molecular graphs.'),
    ]);
    const results = twins.search('graph kernels', 10);
    expect(results.map((r) => r.id)).toEqual(['first', 'second']);
    expect(results[0].similarity).toBe(results[1].similarity);
  });

  it('should handle an empty corpus', () => {
    expect(new TfidfRetriever([]).predict('anything', 5)).toEqual([]);
  });
});
