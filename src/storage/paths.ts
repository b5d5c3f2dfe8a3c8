/**
 * Path Resolution Utilities
 *
 * Provides consistent path generation for the storage layer.
 *
 * Directory Structure:
 * ```
 * ~/.bibrec/                 # Default data directory
 * └── corpus/                # Default corpus directory
 *     ├── database.json      # Document metadata records
 *     └── abstracts.json     # Abstracts, aligned with database.json
 * ```
 *
 * @module storage/paths
 */

import * as path from 'node:path';
import * as os from 'node:os';

/**
 * Corpus metadata file name.
 */
export const DATABASE_FILE = 'database.json';

/**
 * Corpus abstracts file name.
 */
export const ABSTRACTS_FILE = 'abstracts.json';

/**
 * Expand a leading `~` and resolve relative paths against the working directory.
 *
 * @param p - User-supplied path
 * @returns Absolute path
 */
export function resolveUserPath(p: string): string {
  if (p === '~' || p.startsWith('~/')) {
    return path.join(os.homedir(), p.slice(1));
  }
  return path.resolve(p);
}

/**
 * Gets the root data directory for the application.
 *
 * @param override - Value of `BIBREC_DATA_DIR`, when set
 * @returns Absolute path to the data directory (default `~/.bibrec/`)
 */
export function getDataDir(override?: string): string {
  if (override) {
    return resolveUserPath(override);
  }
  return path.join(os.homedir(), '.bibrec');
}

/**
 * Gets the corpus directory.
 *
 * @param dataDir - Resolved data directory
 * @param override - Value of `BIBREC_CORPUS_DIR`, when set
 * @returns Absolute path to the corpus directory (default `<data dir>/corpus`)
 * @example
 * ```typescript
 * getCorpusDir('/home/username/.bibrec', '~/papers'); // '/home/username/papers'
 * ```
 */
export function getCorpusDir(dataDir: string, override?: string): string {
  if (override) {
    return resolveUserPath(override);
  }
  return path.join(dataDir, 'corpus');
}

/**
 * Gets the path to a corpus file.
 *
 * @param corpusDir - Corpus directory
 * @param fileName - DATABASE_FILE or ABSTRACTS_FILE
 */
export function getCorpusFilePath(corpusDir: string, fileName: string): string {
  return path.join(corpusDir, fileName);
}
