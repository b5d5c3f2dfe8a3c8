/**
 * Corpus Store
 *
 * Loads the read-only corpus from its two files and checks that they agree
 * before any retrieval happens.
 *
 * @module corpus/store
 */

import type { ZodType, ZodTypeDef } from 'zod';
import type { Corpus, Logger } from '../pipeline/types.js';
import {
  AbstractListSchema,
  DocumentRecordListSchema,
  type Document,
  type DocumentRecord,
} from '../schemas/document.js';
import { DataConsistencyError, MissingDependencyError } from '../errors/index.js';
import { fileExists, readJson } from '../storage/atomic.js';
import { ABSTRACTS_FILE, DATABASE_FILE, getCorpusFilePath } from '../storage/paths.js';

// ============================================================================
// Corpus Construction
// ============================================================================

/**
 * Index a document list by id. When ids repeat, the first document keeps the id.
 *
 * @param documents - Documents in storage order
 */
export function createCorpus(documents: readonly Document[]): Corpus {
  const byId = new Map<string, Document>();
  for (const document of documents) {
    if (!byId.has(document.id)) {
      byId.set(document.id, document);
    }
  }
  return { documents, byId };
}

/**
 * Join metadata records with their abstracts (aligned by position).
 *
 * @param records - Entries of database.json
 * @param abstracts - Entries of abstracts.json
 * @throws DataConsistencyError if the counts differ
 */
export function mergeAbstracts(
  records: readonly DocumentRecord[],
  abstracts: readonly string[]
): Document[] {
  if (records.length !== abstracts.length) {
    throw new DataConsistencyError(
      'Error while loading data. Expected same number of papers and abstracts. ' +
        `Instead ${records.length} papers and ${abstracts.length} abstracts were found`,
      records.length,
      abstracts.length
    );
  }
  return records.map((record, i) => ({ ...record, abstract: abstracts[i] }));
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Read one corpus file and validate it.
 */
async function readCorpusFile<T>(
  corpusDir: string,
  fileName: string,
  schema: ZodType<T, ZodTypeDef, unknown>
): Promise<T> {
  const filePath = getCorpusFilePath(corpusDir, fileName);

  if (!(await fileExists(filePath))) {
    throw new MissingDependencyError(filePath);
  }

  let raw: unknown;
  try {
    raw = await readJson(filePath);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new DataConsistencyError(`Could not read corpus file ${filePath}: ${message}`);
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new DataConsistencyError(
      `Corpus file ${filePath} is invalid at ${issue.path.join('.') || '<root>'}: ${issue.message}`
    );
  }
  return result.data;
}

/**
 * Load the corpus from a directory holding database.json and abstracts.json.
 *
 * @param corpusDir - Corpus directory
 * @param logger - Optional logger
 * @returns Loaded corpus
 * @throws MissingDependencyError if a file is absent
 * @throws DataConsistencyError if a file is invalid or the counts differ
 */
export async function loadCorpus(corpusDir: string, logger?: Logger): Promise<Corpus> {
  logger?.debug(`[corpus] Loading corpus from ${corpusDir}`);

  const abstracts = await readCorpusFile(corpusDir, ABSTRACTS_FILE, AbstractListSchema);
  const records = await readCorpusFile(corpusDir, DATABASE_FILE, DocumentRecordListSchema);

  const corpus = createCorpus(mergeAbstracts(records, abstracts));
  logger?.debug(`[corpus] Loaded ${corpus.documents.length} documents`);

  return corpus;
}
