/**
 * Tests for the error taxonomy
 *
 * @module errors/index.test
 */

import { describe, it, expect } from '@jest/globals';
import {
  DataConsistencyError,
  InputLoadError,
  MissingDependencyError,
  isFatalLoadError,
} from './index.js';

describe('errors', () => {
  it('should name the missing resource', () => {
    const error = new MissingDependencyError('/data/corpus/abstracts.json');
    expect(error.name).toBe('MissingDependencyError');
    expect(error.resource).toBe('/data/corpus/abstracts.json');
    expect(error.message).toBe('Required resource is missing: /data/corpus/abstracts.json');
  });

  it('should keep the library path and cause', () => {
    const cause = new Error('EACCES');
    const error = new InputLoadError('Could not read library', '/tmp/lib.bib', { cause });
    expect(error.name).toBe('InputLoadError');
    expect(error.path).toBe('/tmp/lib.bib');
    expect(error.cause).toBe(cause);
  });

  it('should carry expected and actual counts', () => {
    const error = new DataConsistencyError('mismatch', 3, 2);
    expect([error.name, error.expected, error.actual]).toEqual(['DataConsistencyError', 3, 2]);
  });

  it('should recognize fatal load errors only', () => {
    expect(isFatalLoadError(new DataConsistencyError('x'))).toBe(true);
    expect(isFatalLoadError(new InputLoadError('x', 'p'))).toBe(true);
    expect(isFatalLoadError(new MissingDependencyError('r'))).toBe(true);
    expect(isFatalLoadError(new Error('x'))).toBe(false);
    expect(isFatalLoadError('x')).toBe(false);
  });
});
