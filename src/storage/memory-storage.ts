import type { LoadFailure } from '../core/errors.js';
import type { Document } from '../types/index.js';
import { decodeDocument, describeError, encodeDocument } from './codec.js';
import type { LoadResult, PersistenceAdapter } from './types.js';

export interface MemoryStorageOptions {
  /**
   * Raw encoded records to start with, keyed by record name.
   * Useful to simulate records written by an earlier process.
   */
  records?: Record<string, string>;
}

/**
 * In-process PersistenceAdapter.
 * Keeps the same encoded JSON records the file adapter writes, so loading
 * goes through the same decoder (and the same per-record failures).
 */
export class MemoryStorage implements PersistenceAdapter {
  private records: Map<string, string>;

  constructor(options: MemoryStorageOptions = {}) {
    this.records = new Map(Object.entries(options.records ?? {}));
  }

  get size(): number {
    return this.records.size;
  }

  has(id: string): boolean {
    return this.records.has(id);
  }

  /**
   * The encoded record stored for `id`.
   */
  getRecord(id: string): string | undefined {
    return this.records.get(id);
  }

  async loadAll(): Promise<LoadResult> {
    const documents: Document[] = [];
    const failures: LoadFailure[] = [];

    for (const [key, content] of this.records) {
      try {
        documents.push(decodeDocument(content));
      } catch (error) {
        failures.push({ source: key, reason: describeError(error) });
      }
    }

    return { documents, failures };
  }

  async save(document: Document): Promise<void> {
    this.records.set(document.id, encodeDocument(document));
  }

  async delete(id: string): Promise<void> {
    this.records.delete(id);
  }

  async clear(): Promise<void> {
    this.records.clear();
  }
}
