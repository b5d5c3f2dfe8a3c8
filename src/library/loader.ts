/**
 * User Library Loader
 *
 * Loads the user's bibliography from a `.bib` or `.json` file. Any failure
 * here is fatal: there is nothing to recommend from without a library.
 *
 * @module library/loader
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Logger } from '../pipeline/types.js';
import {
  LibraryFileSchema,
  UserLibraryEntrySchema,
  type UserLibraryEntry,
} from '../schemas/library.js';
import { InputLoadError } from '../errors/index.js';
import { isErrnoException } from '../storage/atomic.js';
import { parseBibtex, splitAuthors, type BibtexEntry } from './bibtex.js';

// ============================================================================
// Entry Conversion
// ============================================================================

/**
 * Convert a BibTeX entry into a library entry.
 *
 * @returns The entry, or null when it has no title
 */
export function bibtexToLibraryEntry(entry: BibtexEntry): UserLibraryEntry | null {
  const { title, abstract, year, author } = entry.fields;
  const parsedYear = year !== undefined && /^\d+$/.test(year) ? Number(year) : undefined;

  const result = UserLibraryEntrySchema.safeParse({
    key: entry.key || undefined,
    title,
    abstract: abstract ?? '',
    year: parsedYear,
    authors: author ? splitAuthors(author) : [],
  });

  return result.success ? result.data : null;
}

/**
 * Parse BibTeX source into library entries. Entries without a title are skipped.
 */
export function parseBibtexLibrary(source: string, logger?: Logger): UserLibraryEntry[] {
  const entries: UserLibraryEntry[] = [];
  for (const bibEntry of parseBibtex(source)) {
    const entry = bibtexToLibraryEntry(bibEntry);
    if (entry) {
      entries.push(entry);
    } else {
      logger?.debug(`[library] Skipping entry "${bibEntry.key}" without a title`);
    }
  }
  return entries;
}

/**
 * Parse a JSON library (an array of entries).
 *
 * @throws Error describing the first invalid entry
 */
export function parseJsonLibrary(source: string): UserLibraryEntry[] {
  const result = LibraryFileSchema.safeParse(JSON.parse(source));
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new Error(`invalid entry at ${issue.path.join('.') || '<root>'}: ${issue.message}`);
  }
  return result.data;
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Load the user's library.
 *
 * @param filePath - Path to a .bib or .json file
 * @param logger - Optional logger
 * @returns Library entries in file order
 * @throws InputLoadError if the file is missing, unparsable, of an unknown
 *   type, or holds no entry with a title
 */
export async function loadUserLibrary(
  filePath: string,
  logger?: Logger
): Promise<UserLibraryEntry[]> {
  const extension = path.extname(filePath).toLowerCase();
  if (extension !== '.bib' && extension !== '.json') {
    throw new InputLoadError(
      `Unsupported library file type "${extension || '(none)'}": expected .bib or .json`,
      filePath
    );
  }

  let source: string;
  try {
    source = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new InputLoadError(`Library file not found: ${filePath}`, filePath, { cause: error });
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new InputLoadError(`Could not read library file ${filePath}: ${message}`, filePath, {
      cause: error,
    });
  }

  let entries: UserLibraryEntry[];
  try {
    entries = extension === '.bib' ? parseBibtexLibrary(source, logger) : parseJsonLibrary(source);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new InputLoadError(`Could not parse library file ${filePath}: ${message}`, filePath, {
      cause: error,
    });
  }

  if (entries.length === 0) {
    throw new InputLoadError(`Library file ${filePath} contains no entries with a title`, filePath);
  }

  logger?.debug(`[library] Loaded ${entries.length} entries from ${filePath}`);
  return entries;
}
