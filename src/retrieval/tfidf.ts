/**
 * TF-IDF Candidate Retriever
 *
 * In-memory vector index over each corpus document's title and abstract.
 * Built once when the corpus is loaded; queries rank documents by cosine
 * similarity against the query's TF-IDF vector.
 *
 * Weights:
 * ```
 * tf(t, d)  = count(t, d) / |d|
 * idf(t)    = ln((N + 1) / (df(t) + 1)) + 1
 * w(t, d)   = tf(t, d) × idf(t), L2-normalized per document
 * ```
 *
 * @module retrieval/tfidf
 */

import type { CandidateRetriever } from '../pipeline/types.js';
import type { Document } from '../schemas/document.js';
import { tokenize } from '../text/tokenize.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Posting list entry: a document position and its normalized term weight.
 */
interface Posting {
  doc: number;
  weight: number;
}

/**
 * A retrieved document id with its cosine similarity.
 */
export interface ScoredCandidate {
  id: string;
  similarity: number;
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Relative term frequencies of a token list.
 */
function termFrequencies(tokens: readonly string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const token of tokens) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  for (const [term, count] of counts) {
    counts.set(term, count / tokens.length);
  }
  return counts;
}

/**
 * Text indexed for a document. The title is repeated to weight it more.
 */
function documentText(document: Pick<Document, 'title' | 'abstract'>): string {
  return `${document.title} ${document.title} ${document.abstract}`;
}

// ============================================================================
// Retriever
// ============================================================================

export class TfidfRetriever implements CandidateRetriever {
  private readonly ids: string[];
  private readonly idf = new Map<string, number>();
  private readonly postings = new Map<string, Posting[]>();

  /**
   * Build the index.
   *
   * @param documents - Corpus documents, in storage order
   */
  constructor(documents: readonly Document[]) {
    this.ids = documents.map((document) => document.id);

    const frequencies = documents.map((document) => termFrequencies(tokenize(documentText(document))));

    const documentFrequency = new Map<string, number>();
    for (const tf of frequencies) {
      for (const term of tf.keys()) {
        documentFrequency.set(term, (documentFrequency.get(term) ?? 0) + 1);
      }
    }

    const total = documents.length;
    for (const [term, df] of documentFrequency) {
      this.idf.set(term, Math.log((total + 1) / (df + 1)) + 1);
    }

    frequencies.forEach((tf, doc) => {
      const weights = [...tf].map(([term, value]) => [term, value * this.idfOf(term)] as const);
      const norm = Math.sqrt(weights.reduce((sum, [, w]) => sum + w * w, 0));
      if (norm === 0) {
        return;
      }
      for (const [term, weight] of weights) {
        const list = this.postings.get(term) ?? [];
        list.push({ doc, weight: weight / norm });
        this.postings.set(term, list);
      }
    });
  }

  /**
   * Number of indexed documents.
   */
  get size(): number {
    return this.ids.length;
  }

  /**
   * Rank documents against a text, with similarities.
   *
   * Only documents sharing at least one term with the query are returned.
   * Equal similarities keep corpus order.
   *
   * @param text - Query text
   * @param limit - Maximum number of candidates
   */
  search(text: string, limit: number): ScoredCandidate[] {
    if (limit <= 0) {
      return [];
    }

    const query = termFrequencies(tokenize(text));
    const queryWeights = [...query]
      .filter(([term]) => this.idf.has(term))
      .map(([term, value]) => [term, value * this.idfOf(term)] as const);
    const queryNorm = Math.sqrt(queryWeights.reduce((sum, [, w]) => sum + w * w, 0));
    if (queryNorm === 0) {
      return [];
    }

    const dots = new Map<number, number>();
    for (const [term, weight] of queryWeights) {
      for (const posting of this.postings.get(term) ?? []) {
        dots.set(posting.doc, (dots.get(posting.doc) ?? 0) + weight * posting.weight);
      }
    }

    return [...dots.entries()]
      .sort((a, b) => b[1] - a[1] || a[0] - b[0])
      .slice(0, limit)
      .map(([doc, dot]) => ({ id: this.ids[doc], similarity: dot / queryNorm }));
  }

  /**
   * CandidateRetriever contract: ids only, best first.
   */
  predict(text: string, limit: number): string[] {
    return this.search(text, limit).map((candidate) => candidate.id);
  }

  private idfOf(term: string): number {
    return this.idf.get(term) ?? 0;
  }
}
