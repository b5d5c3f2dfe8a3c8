/**
 * Tests for overlap exclusion, year window and ranking
 *
 * @module ranking/filters.test
 */

import { describe, it, expect } from '@jest/globals';
import { removeOverlap, filterByYear } from './filters.js';
import { sortByScore, rankAndTruncate } from './ranker.js';

const rows = [
  { title: 'Old', year: 2010, score: 0.2 },
  { title: 'Middle', year: 2015, score: 0.9 },
  { title: 'Recent', year: 2019, score: 0.5 },
  { title: 'Newest', year: 2021, score: 0.9 },
];

describe('removeOverlap', () => {
  it('should drop rows whose title is in the library', () => {
    const result = removeOverlap(rows, [{ title: 'Middle' }, { title: 'Not in corpus' }]);
    expect(result.map((r) => r.title)).toEqual(['Old', 'Recent', 'Newest']);
  });

  it('should match titles exactly', () => {
    const result = removeOverlap(rows, [{ title: 'middle' }, { title: 'Middle ' }]);
    expect(result).toHaveLength(4);
  });

  it('should return a copy when the library is empty', () => {
    const result = removeOverlap(rows, []);
    expect(result).toEqual(rows);
    expect(result).not.toBe(rows);
  });
});

describe('filterByYear', () => {
  it('should keep years inside an inclusive window', () => {
    const result = filterByYear(rows, { since: 2015, to: 2019 });
    expect(result.map((r) => r.year)).toEqual([2015, 2019]);
  });

  it('should apply a lower bound alone', () => {
    expect(filterByYear(rows, { since: 2019 }).map((r) => r.year)).toEqual([2019, 2021]);
  });

  it('should apply an upper bound alone', () => {
    expect(filterByYear(rows, { to: 2015 }).map((r) => r.year)).toEqual([2010, 2015]);
  });

  it('should keep everything without bounds', () => {
    expect(filterByYear(rows, {})).toHaveLength(4);
  });

  it('should return an empty list when nothing falls in the window', () => {
    expect(filterByYear(rows, { since: 2011, to: 2014 })).toEqual([]);
  });
});

describe('sortByScore', () => {
  it('should sort descending and keep tied rows in input order', () => {
    expect(sortByScore(rows).map((r) => r.title)).toEqual(['Middle', 'Newest', 'Recent', 'Old']);
  });

  it('should not mutate its input', () => {
    const input = [...rows];
    sortByScore(input);
    expect(input).toEqual(rows);
  });
});

describe('rankAndTruncate', () => {
  it('should keep the top N rows', () => {
    expect(rankAndTruncate(rows, 2).map((r) => r.title)).toEqual(['Middle', 'Newest']);
  });

  it('should return every row when N exceeds the row count', () => {
    expect(rankAndTruncate(rows, 10)).toHaveLength(4);
  });

  it('should return nothing for N <= 0', () => {
    expect(rankAndTruncate(rows, 0)).toEqual([]);
    expect(rankAndTruncate(rows, -3)).toEqual([]);
  });
});
