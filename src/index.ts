// Stores
export { DocumentStore, compareResults } from './store/document-store.js';
export type { DocumentStoreOptions, UpdateWithEmbeddingInput, AddChunksInput } from './store/document-store.js';
export { EmbeddingStore } from './store/embedding-store.js';
export type { Embedder, EmbeddingStoreOptions, AddDocumentsInput, AddDocumentInput } from './store/embedding-store.js';

// Configuration
export { storeConfigSchema, resolveStoreConfig, defaultStorageDirectory, resolveStorageDirectory } from './core/config.js';
export type { StoreConfig, StoreConfigInput } from './core/config.js';

// Errors
export {
  NearstoreError,
  DimensionMismatchError,
  InvalidInputError,
  LoadFailedError,
  PersistenceError,
  StateError,
} from './core/errors.js';
export type { LoadFailure, PersistenceFailure, PersistenceOperation } from './core/errors.js';

// Persistence
export { FileStorage } from './storage/file-storage.js';
export type { FileStorageOptions } from './storage/file-storage.js';
export { MemoryStorage } from './storage/memory-storage.js';
export type { MemoryStorageOptions } from './storage/memory-storage.js';
export { documentRecordSchema, encodeDocument, decodeDocument } from './storage/codec.js';
export type { DocumentRecord } from './storage/codec.js';
export type { PersistenceAdapter, LoadResult } from './storage/types.js';

// Search building blocks
export { LexicalIndex, tokenize } from './search/bm25.js';
export type { LexicalIndexOptions, LexicalHit, IndexableDocument } from './search/bm25.js';
export { hybridScore, normalizeBm25 } from './search/hybrid.js';
export { matchesFilter } from './search/filter.js';
export { l2Norm, normalize, dot, cosineSimilarity } from './vector/math.js';

// Ingestion
export { chunkText, buildChunkMetadata, decodeUtf8 } from './ingest/chunker.js';

// Logging
export { consoleLogger, silentLogger, createLevelLogger } from './types/logger.js';

// Utilities
export { TaskPool } from './utils/task-pool.js';
export type { TaskPoolOptions } from './utils/task-pool.js';

export type * from './types/index.js';
