/**
 * Global constants for nearstore
 * Centralizes magic numbers and configuration defaults
 */

// Vector math
export const NORMALIZATION_EPSILON = 1e-9;

// Search defaults
export const DEFAULT_NUM_RESULTS = 10;
export const DEFAULT_HYBRID_WEIGHT = 0.5;

// BM25 defaults
export const DEFAULT_BM25_K1 = 1.2;
export const DEFAULT_BM25_B = 0.75;

// Hybrid ranking
export const PURE_VECTOR_WEIGHT = 0.999;
export const PURE_TEXT_WEIGHT = 0.001;
export const BM25_NORMALIZATION_DIVISOR = 10.0;

// Ingestion defaults
export const DEFAULT_CHUNK_SIZE = 1000;
export const DEFAULT_CHUNK_OVERLAP = 100;
export const CHUNK_DOCUMENT_TYPE = 'fileChunk' as const;

// Persistence
export const DEFAULT_PERSIST_CONCURRENCY = 8;
export const RECORD_FILE_EXTENSION = '.json';
export const STORAGE_ROOT_DIRNAME = 'nearstore';
