import type { LoadFailure } from '../core/errors.js';
import type { Document } from '../types/index.js';

export interface LoadResult {
  /** Every record that decoded successfully */
  documents: Document[];
  /** One entry per record that could not be read or decoded */
  failures: LoadFailure[];
}

/**
 * Persistence contract consumed by the document store.
 * Holds serialized copies only; the store's table is the source of truth.
 */
export interface PersistenceAdapter {
  /** Load every persisted document, collecting per-record failures */
  loadAll(): Promise<LoadResult>;
  /** Write (or overwrite) the record for `document.id` */
  save(document: Document): Promise<void>;
  /** Remove one record; removing a missing record is a no-op */
  delete(id: string): Promise<void>;
  /** Remove every record */
  clear(): Promise<void>;
}
