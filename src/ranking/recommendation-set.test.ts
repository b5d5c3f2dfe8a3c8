/**
 * Tests for RecommendationSet
 *
 * @module ranking/recommendation-set.test
 */

import { describe, it, expect } from '@jest/globals';
import type { Document } from '../schemas/document.js';
import type { Recommendation } from '../schemas/recommendation.js';
import { RecommendationSet } from './recommendation-set.js';

function doc(id: string, title: string, year: number): Document {
  return { id, title, year, authors: [], abstract: `Abstract of ${title}` };
}

function rec(title: string, year: number, score: number): Recommendation {
  return { ...doc(title.toLowerCase(), title, year), score };
}

const documents = [
  doc('1', 'Alpha', 2010),
  doc('2', 'Beta', 2015),
  doc('3', 'Gamma', 2019),
  doc('4', 'Beta', 2016),
  doc('5', 'Delta', 2021),
];

describe('RecommendationSet', () => {
  describe('fromScores', () => {
    it('should score documents in corpus order by points / maxScore', () => {
      const set = RecommendationSet.fromScores(documents, {
        scores: new Map([
          ['Gamma', 150],
          ['Alpha', 50],
        ]),
        maxScore: 200,
        queryCount: 2,
      });

      expect(set.toArray().map((r) => [r.title, r.score])).toEqual([
        ['Alpha', 0.25],
        ['Gamma', 0.75],
      ]);
    });

    it('should keep the first document of a duplicated title', () => {
      const set = RecommendationSet.fromScores(documents, {
        scores: new Map([['Beta', 10]]),
        maxScore: 10,
        queryCount: 1,
      });

      expect(set.size).toBe(1);
      expect(set.toArray()[0]).toEqual({ ...documents[1], score: 1 });
    });

    it('should skip titles missing from the corpus', () => {
      const set = RecommendationSet.fromScores(documents, {
        scores: new Map([['Unknown', 10]]),
        maxScore: 10,
        queryCount: 1,
      });
      expect(set.isEmpty()).toBe(true);
    });

    it('should be empty when no query contributed', () => {
      const set = RecommendationSet.fromScores(documents, {
        scores: new Map(),
        maxScore: 0,
        queryCount: 0,
      });
      expect(set.isEmpty()).toBe(true);
    });
  });

  describe('operations', () => {
    const set = RecommendationSet.fromRows([
      rec('Old', 2010, 0.3),
      rec('Middle', 2015, 0.6),
      rec('Recent', 2019, 0.6),
      rec('Newest', 2021, 0.9),
    ]);

    it('should leave the original set unchanged', () => {
      set.removeOverlap([{ title: 'Old' }]).filterYears({ since: 2015 }).rankAndTruncate(1);
      expect(set.titles()).toEqual(['Old', 'Middle', 'Recent', 'Newest']);
    });

    it('should never return a library title', () => {
      const result = set.removeOverlap([{ title: 'Newest' }]).rankAndTruncate(10);
      expect(result.titles()).toEqual(['Middle', 'Recent', 'Old']);
    });

    it('should never return a year outside the window', () => {
      const result = set.filterYears({ since: 2015, to: 2019 }).rankAndTruncate(10);
      expect(result.titles()).toEqual(['Middle', 'Recent']);
    });

    it('should return min(N, survivors) rows', () => {
      const survivors = set.removeOverlap([{ title: 'Old' }]).filterYears({ to: 2019 });
      expect(survivors.rankAndTruncate(1).size).toBe(1);
      expect(survivors.rankAndTruncate(5).size).toBe(2);
    });

    it('should yield an empty set when filters remove everything', () => {
      const result = set.filterYears({ since: 2030 }).rankAndTruncate(5);
      expect(result.isEmpty()).toBe(true);
      expect(result.titles()).toEqual([]);
    });

    it('should iterate rows in order', () => {
      expect([...set.rankAndTruncate(2)].map((r) => r.title)).toEqual(['Newest', 'Middle']);
    });
  });
});
