/**
 * Tests for keyword aggregation
 *
 * @module ranking/keywords.test
 */

import { describe, it, expect, jest } from '@jest/globals';
import type { KeywordExtractor } from '../pipeline/types.js';
import { aggregateKeywords, topKeywords } from './keywords.js';

function fixedExtractor(lists: Record<string, string[]>): KeywordExtractor {
  return { extract: (text) => lists[text] ?? [] };
}

describe('aggregateKeywords', () => {
  it('should add rank weights across entries', () => {
    const profile = aggregateKeywords(
      [
        { title: 'First', abstract: 'first abstract' },
        { title: 'Second', abstract: 'second abstract' },
      ],
      3,
      fixedExtractor({
        'first abstract': ['graph', 'neural'],
        'second abstract': ['graph', 'learning'],
      })
    );

    expect([...profile.entries()]).toEqual([
      ['graph', 6],
      ['neural', 2],
      ['learning', 2],
    ]);
  });

  it('should fall back to the title when the abstract is blank', () => {
    const extract = jest.fn((text: string, limit: number) => [`${text}:${limit}`]);
    aggregateKeywords([{ title: 'Only a title', abstract: '   ' }], 4, { extract });

    expect(extract).toHaveBeenCalledWith('Only a title', 4);
  });

  it('should ignore keywords beyond the per-entry limit', () => {
    const profile = aggregateKeywords(
      [{ title: 'T', abstract: 'text' }],
      2,
      fixedExtractor({ text: ['a', 'b', 'c'] })
    );
    expect([...profile.entries()]).toEqual([
      ['a', 2],
      ['b', 1],
    ]);
  });

  it('should log entries without keywords', () => {
    const debug = jest.fn<(message: string) => void>();
    const logger = { debug, info: jest.fn(), warn: jest.fn(), error: jest.fn() };

    const profile = aggregateKeywords(
      [{ title: 'Empty', abstract: 'nothing here' }],
      5,
      fixedExtractor({}),
      { logger }
    );

    expect(profile.size).toBe(0);
    expect(debug).toHaveBeenCalledWith('[keywords] No keywords extracted for: "Empty"');
  });
});

describe('topKeywords', () => {
  const profile = new Map([
    ['neural', 2],
    ['graph', 6],
    ['learning', 2],
  ]);

  it('should order by weight and keep first-seen order for ties', () => {
    expect(topKeywords(profile, 3)).toEqual([
      { keyword: 'graph', score: 6 },
      { keyword: 'neural', score: 2 },
      { keyword: 'learning', score: 2 },
    ]);
  });

  it('should honour the limit', () => {
    expect(topKeywords(profile, 1)).toEqual([{ keyword: 'graph', score: 6 }]);
    expect(topKeywords(profile, 0)).toEqual([]);
  });
});
