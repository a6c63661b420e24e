/**
 * Core data types shared by the store, the lexical index and the adapters.
 */

export type { Logger, LogLevel } from './logger.js';

/**
 * Key/value metadata attached to a document. Key order is irrelevant.
 */
export type Metadata = Record<string, string>;

/**
 * Exact-match conjunction over metadata: a document matches when it has
 * metadata and every filter key is present with an equal value.
 */
export type MetadataFilter = Record<string, string>;

/**
 * A stored document. Never mutated in place: updates replace it.
 */
export interface Document {
  /** Opaque unique identifier */
  readonly id: string;
  readonly text: string;
  /** Raw embedding, length equals the store dimension */
  readonly embedding: readonly number[];
  readonly createdAt: Date;
  readonly metadata?: Readonly<Metadata>;
}

/**
 * Read-only projection produced by search.
 */
export interface SearchResult {
  id: string;
  text: string;
  /** Cosine similarity, or the hybrid score when a text query was given */
  score: number;
  createdAt: Date;
  metadata?: Metadata;
}

export interface SearchOptions {
  /** Maximum results to return (default: config.defaultNumResults) */
  numResults?: number;
  /** Minimum cosine similarity (default: config.minThreshold ?? 0) */
  threshold?: number;
  /** Metadata filter (exact match on all key-value pairs) */
  filter?: MetadataFilter;
}

export interface DocumentEmbedding {
  raw: number[];
  normalized: number[];
}

export interface AddWithEmbeddingsInput {
  texts: string[];
  embeddings: number[][];
  ids?: string[];
  metadatas?: Array<Metadata | undefined>;
}

export interface AddWithEmbeddingInput {
  text: string;
  embedding: number[];
  id?: string;
  metadata?: Metadata;
}

export interface ChunkOptions {
  /** Maximum characters per chunk (default: 1000) */
  chunkSize?: number;
  /** Characters shared by consecutive chunks (default: 100) */
  overlap?: number;
  /** Shared originalFileID for every chunk (default: a fresh UUID) */
  fileId?: string;
}

export interface IngestResult {
  fileId: string;
  ids: string[];
}
