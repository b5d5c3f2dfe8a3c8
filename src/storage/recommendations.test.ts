/**
 * Tests for recommendation CSV export
 *
 * @module storage/recommendations.test
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { RecommendationSet } from '../ranking/recommendation-set.js';
import type { Recommendation } from '../schemas/recommendation.js';
import {
  CSV_COLUMNS,
  formatRecommendationsCsv,
  parseRecommendationsCsv,
  saveRecommendationsCsv,
  loadRecommendationsCsv,
} from './recommendations.js';

function rec(overrides: Partial<Recommendation> = {}): Recommendation {
  return {
    id: 'd1',
    title: 'Deep Learning, Revisited',
    year: 2020,
    authors: ['Doe, Jane', 'Roe, Richard'],
    journal: 'J. Test',
    abstract: 'An abstract.',
    score: 0.75,
    ...overrides,
  };
}

describe('formatRecommendationsCsv', () => {
  it('should write a header row in column order', () => {
    const csv = formatRecommendationsCsv([]);
    expect(csv.split('\r\n')[0]).toBe(CSV_COLUMNS.join(','));
    expect(CSV_COLUMNS.join(',')).toBe('rank,id,title,year,authors,journal,doi,url,score,abstract');
  });

  it('should write only the header line for no rows', () => {
    expect(formatRecommendationsCsv([])).toBe(CSV_COLUMNS.join(','));
  });

  it('should quote cells containing commas and leave missing fields empty', () => {
    const csv = formatRecommendationsCsv([rec()]);
    expect(csv.split('\r\n')[1]).toBe(
      '1,d1,"Deep Learning, Revisited",2020,"Doe, Jane; Roe, Richard",J. Test,,,0.75,An abstract.'
    );
  });

  it('should number rows from 1 in display order', () => {
    const csv = formatRecommendationsCsv([rec({ id: 'a', title: 'A' }), rec({ id: 'b', title: 'B' })]);
    const lines = csv.split('\r\n');
    expect(lines).toHaveLength(3);
    expect(lines[1].startsWith('1,a,A,')).toBe(true);
    expect(lines[2].startsWith('2,b,B,')).toBe(true);
  });
});

describe('parseRecommendationsCsv', () => {
  it('should read back what was written', () => {
    const rows = [
      rec({ score: 1 / 3, doi: '10.1000/test', url: 'https://example.org/a' }),
      rec({ id: 'd2', title: 'Quoted "Title"', authors: [], journal: undefined, score: 1 }),
    ];

    const parsed = parseRecommendationsCsv(formatRecommendationsCsv(rows));

    expect(parsed).toEqual(rows);
    expect(parsed[0].score).toBe(1 / 3);
    expect(parsed[1].authors).toEqual([]);
    expect(parsed[1].journal).toBeUndefined();
  });

  it('should keep multi-line abstracts', () => {
    const rows = [rec({ abstract: 'First line.\nSecond line.' })];
    expect(parseRecommendationsCsv(formatRecommendationsCsv(rows))[0].abstract).toBe(
      'First line.\nSecond line.'
    );
  });

  it('should reject a score outside (0, 1]', () => {
    const csv = formatRecommendationsCsv([rec({ score: 0.5 })]).replace(',0.5,', ',0,');
    expect(() => parseRecommendationsCsv(csv)).toThrow('Invalid recommendation at row 1: score');
  });

  it('should reject rows with missing columns', () => {
    const csv = `${CSV_COLUMNS.join(',')}\n1,d1`;
    expect(() => parseRecommendationsCsv(csv)).toThrow('Malformed recommendations CSV');
  });
});

describe('CSV files', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'bibrec-csv-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should save and load a recommendation set', async () => {
    const filePath = path.join(tempDir, 'out', 'recommendations.csv');
    const set = RecommendationSet.fromRows([
      rec({ id: 'a', title: 'Alpha', score: 0.9 }),
      rec({ id: 'b', title: 'Beta', score: 0.4 }),
    ]);

    await saveRecommendationsCsv(set, filePath);
    const loaded = await loadRecommendationsCsv(filePath);

    expect(loaded.titles()).toEqual(['Alpha', 'Beta']);
    expect(loaded.toArray()).toEqual(set.toArray());
  });

  it('should write a header-only file for an empty set', async () => {
    const filePath = path.join(tempDir, 'empty.csv');

    await saveRecommendationsCsv(RecommendationSet.empty(), filePath);

    expect(await fs.readFile(filePath, 'utf-8')).toBe(CSV_COLUMNS.join(','));
    expect((await loadRecommendationsCsv(filePath)).isEmpty()).toBe(true);
  });
});
