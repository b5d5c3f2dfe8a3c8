/**
 * Tests for author matching and aggregation
 *
 * @module ranking/authors.test
 */

import { describe, it, expect } from '@jest/globals';
import type { Document } from '../schemas/document.js';
import {
  normalizeAuthorName,
  normalizeAuthorSet,
  filterByAuthors,
  aggregateAuthors,
  topAuthors,
} from './authors.js';

function doc(id: string, title: string, authors: string[]): Document {
  return { id, title, year: 2020, authors, abstract: '' };
}

describe('normalizeAuthorName', () => {
  it('should case-fold and strip punctuation', () => {
    expect(normalizeAuthorName('Hinton, Geoffrey E.')).toBe('hinton geoffrey e');
    expect(normalizeAuthorName("  O'Neil,  C. ")).toBe('oneil c');
    expect(normalizeAuthorName('{Doe}, (Jane)')).toBe('doe jane');
  });
});

describe('normalizeAuthorSet', () => {
  it('should merge spellings and drop names that normalize to nothing', () => {
    expect([...normalizeAuthorSet(['A. Doe', 'a doe', '...'])]).toEqual(['a doe']);
  });
});

describe('filterByAuthors', () => {
  const documents = [
    doc('d1', 'Shared Work', ['Jane Doe', 'Richard Roe']),
    doc('d2', 'Solo Work', ['jane doe.']),
    doc('d3', 'Other Work', ['Someone Else']),
    doc('d4', 'Shared Work', ['Jane Doe']),
  ];

  it('should score documents by the share of query names they match', () => {
    const result = filterByAuthors(documents, ['Jane Doe', 'Richard Roe']);
    expect(result.map((r) => [r.id, r.score])).toEqual([
      ['d1', 1],
      ['d2', 0.5],
    ]);
  });

  it('should count repeated query names once', () => {
    const result = filterByAuthors(documents, ['Jane Doe', 'JANE DOE']);
    expect(result.map((r) => [r.id, r.score])).toEqual([
      ['d1', 1],
      ['d2', 1],
    ]);
  });

  it('should return nothing for unknown or empty names', () => {
    expect(filterByAuthors(documents, ['Nobody'])).toEqual([]);
    expect(filterByAuthors(documents, [])).toEqual([]);
    expect(filterByAuthors(documents, ['  '])).toEqual([]);
  });
});

describe('aggregateAuthors', () => {
  const profile = aggregateAuthors([
    { authors: ['Jane Doe', 'Richard Roe'] },
    { authors: ['jane doe.', 'Jane Doe'] },
    { authors: ['Richard Roe'] },
  ]);

  it('should count each author once per document under the first spelling', () => {
    expect([...profile.entries()]).toEqual([
      ['jane doe', { name: 'Jane Doe', count: 2 }],
      ['richard roe', { name: 'Richard Roe', count: 2 }],
    ]);
  });

  it('should list top authors by count, first seen first on ties', () => {
    expect(topAuthors(profile, 1)).toEqual([{ name: 'Jane Doe', count: 2 }]);
    expect(topAuthors(profile, 0)).toEqual([]);
  });

  it('should be empty for no recommendations', () => {
    expect(aggregateAuthors([]).size).toBe(0);
  });
});
