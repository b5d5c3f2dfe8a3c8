/**
 * Path Resolution Utilities Tests
 *
 * Tests cover directory defaults and overrides, tilde expansion
 * and corpus file paths.
 *
 * @module storage/paths.test
 */

import * as os from 'node:os';
import * as path from 'node:path';
import {
  ABSTRACTS_FILE,
  DATABASE_FILE,
  getCorpusDir,
  getCorpusFilePath,
  getDataDir,
  resolveUserPath,
} from './paths.js';

describe('storage/paths', () => {
  describe('resolveUserPath', () => {
    it('should expand a bare tilde', () => {
      expect(resolveUserPath('~')).toBe(os.homedir());
    });

    it('should expand a leading tilde segment', () => {
      expect(resolveUserPath('~/papers/lib.bib')).toBe(path.join(os.homedir(), 'papers', 'lib.bib'));
    });

    it('should keep absolute paths', () => {
      expect(resolveUserPath('/data/corpus')).toBe('/data/corpus');
    });

    it('should resolve relative paths against the working directory', () => {
      expect(resolveUserPath('lib.bib')).toBe(path.join(process.cwd(), 'lib.bib'));
    });

    it('should not expand a tilde inside a name', () => {
      expect(resolveUserPath('~papers')).toBe(path.join(process.cwd(), '~papers'));
    });
  });

  describe('getDataDir', () => {
    it('should default to ~/.bibrec', () => {
      expect(getDataDir()).toBe(path.join(os.homedir(), '.bibrec'));
      expect(getDataDir('')).toBe(path.join(os.homedir(), '.bibrec'));
    });

    it('should resolve an override', () => {
      expect(getDataDir('/custom/data/dir')).toBe('/custom/data/dir');
      expect(getDataDir('~/bib')).toBe(path.join(os.homedir(), 'bib'));
    });
  });

  describe('getCorpusDir', () => {
    it('should default to a corpus directory under the data directory', () => {
      expect(getCorpusDir('/custom/data/dir')).toBe(path.join('/custom/data/dir', 'corpus'));
    });

    it('should prefer an override', () => {
      expect(getCorpusDir('/custom/data/dir', '/srv/corpus')).toBe('/srv/corpus');
    });
  });

  describe('getCorpusFilePath', () => {
    it('should join the corpus directory and file name', () => {
      expect(getCorpusFilePath('/srv/corpus', DATABASE_FILE)).toBe('/srv/corpus/database.json');
      expect(getCorpusFilePath('/srv/corpus', ABSTRACTS_FILE)).toBe('/srv/corpus/abstracts.json');
    });
  });
});
