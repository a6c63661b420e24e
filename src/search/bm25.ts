/**
 * Okapi BM25 lexical index.
 *
 * The index is derived state: it is rebuilt from the full document set on
 * every mutation. `addDocument` is an incremental shortcut that leaves the
 * index in exactly the state a rebuild would produce.
 */

import { DEFAULT_BM25_B, DEFAULT_BM25_K1 } from '../constants.js';
import type { Document } from '../types/index.js';

export type IndexableDocument = Pick<Document, 'id' | 'text'>;

export interface LexicalIndexOptions {
  /** Term-frequency saturation (default: 1.2) */
  k1?: number;
  /** Document-length normalization (default: 0.75) */
  b?: number;
}

export interface LexicalHit {
  id: string;
  score: number;
}

interface IndexedEntry {
  length: number;
  termCounts: Map<string, number>;
}

/**
 * Tokenize text for lexical matching: lower-case, fold diacritics,
 * split on runs of non-alphanumeric characters, drop empties.
 *
 * @example
 * ```ts
 * tokenize('Café, crème-brûlée!'); // ['cafe', 'creme', 'brulee']
 * ```
 */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .normalize('NFD')
    .replace(/\p{M}+/gu, '')
    .split(/[^\p{L}\p{N}]+/u)
    .filter((t) => t.length > 0);
}

function countTerms(tokens: string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const token of tokens) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return counts;
}

export class LexicalIndex {
  readonly k1: number;
  readonly b: number;
  private entries: Map<string, IndexedEntry> = new Map();
  private documentFrequencies: Map<string, number> = new Map();
  private totalLength = 0;

  constructor(documents: Iterable<IndexableDocument> = [], options: LexicalIndexOptions = {}) {
    this.k1 = options.k1 ?? DEFAULT_BM25_K1;
    this.b = options.b ?? DEFAULT_BM25_B;

    for (const doc of documents) {
      this.index(doc);
    }
  }

  /**
   * Number of indexed documents.
   */
  get size(): number {
    return this.entries.size;
  }

  get isEmpty(): boolean {
    return this.entries.size === 0;
  }

  /**
   * Mean token count across indexed documents (0 when empty).
   */
  get averageDocumentLength(): number {
    return this.entries.size === 0 ? 0 : this.totalLength / this.entries.size;
  }

  documentFrequency(term: string): number {
    return this.documentFrequencies.get(term) ?? 0;
  }

  documentLength(id: string): number | undefined {
    return this.entries.get(id)?.length;
  }

  /**
   * Snapshot of the term → document-frequency table, sorted by term.
   */
  documentFrequencyTable(): Array<[string, number]> {
    return Array.from(this.documentFrequencies.entries()).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  }

  /**
   * Index one more document. Re-adding an indexed id replaces it.
   */
  addDocument(doc: IndexableDocument): void {
    if (this.entries.has(doc.id)) {
      this.unindex(doc.id);
    }
    this.index(doc);
  }

  /**
   * BM25 score of `query` against one indexed document, or undefined when
   * the id is not indexed. Negative contributions are kept.
   */
  score(query: string, id: string): number | undefined {
    const entry = this.entries.get(id);
    if (!entry) return undefined;
    return this.scoreEntry(tokenize(query), entry);
  }

  /**
   * Score every indexed document, discard zero-or-negative scores,
   * and return the `topK` best, highest first.
   */
  search(query: string, topK: number = this.entries.size): LexicalHit[] {
    const queryTerms = tokenize(query);
    const hits: LexicalHit[] = [];

    for (const [id, entry] of this.entries) {
      const score = this.scoreEntry(queryTerms, entry);
      if (score > 0) {
        hits.push({ id, score });
      }
    }

    return hits
      .sort((a, b) => b.score - a.score || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
      .slice(0, Math.max(0, topK));
  }

  private scoreEntry(queryTerms: string[], entry: IndexedEntry): number {
    const n = this.entries.size;
    const avgLength = this.averageDocumentLength;
    const lengthRatio = avgLength > 0 ? entry.length / avgLength : 0;
    let score = 0;

    for (const term of queryTerms) {
      const tf = entry.termCounts.get(term) ?? 0;
      if (tf === 0) continue;
      const df = this.documentFrequencies.get(term) ?? 0;

      // Negative for terms present in more than half the documents
      const idf = Math.log((n - df + 0.5) / (df + 0.5));
      const numerator = tf * (this.k1 + 1);
      const denominator = tf + this.k1 * (1 - this.b + this.b * lengthRatio);

      score += idf * (numerator / denominator);
    }

    return score;
  }

  private index(doc: IndexableDocument): void {
    const tokens = tokenize(doc.text);
    const termCounts = countTerms(tokens);

    this.entries.set(doc.id, { length: tokens.length, termCounts });
    this.totalLength += tokens.length;

    for (const term of termCounts.keys()) {
      this.documentFrequencies.set(term, (this.documentFrequencies.get(term) ?? 0) + 1);
    }
  }

  private unindex(id: string): void {
    const entry = this.entries.get(id);
    if (!entry) return;

    this.entries.delete(id);
    this.totalLength -= entry.length;

    for (const term of entry.termCounts.keys()) {
      const df = (this.documentFrequencies.get(term) ?? 0) - 1;
      if (df > 0) {
        this.documentFrequencies.set(term, df);
      } else {
        this.documentFrequencies.delete(term);
      }
    }
  }
}
