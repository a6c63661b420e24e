/**
 * EmbeddingStore - a DocumentStore that produces its own embeddings.
 *
 * The embedding model is an injected capability with an explicit lifecycle:
 * `load()` runs once on first use and the loaded embedder is reused for
 * every later call. All ranking, caching and persistence is delegated to the
 * wrapped DocumentStore.
 */

import { promises as fs } from 'node:fs';
import { basename } from 'node:path';
import { DEFAULT_CHUNK_OVERLAP, DEFAULT_CHUNK_SIZE } from '../constants.js';
import { InvalidInputError } from '../core/errors.js';
import { chunkText, decodeUtf8 } from '../ingest/chunker.js';
import type {
  ChunkOptions,
  Document,
  DocumentEmbedding,
  IngestResult,
  Metadata,
  MetadataFilter,
  SearchOptions,
  SearchResult,
} from '../types/index.js';
import { normalize } from '../vector/math.js';
import { DocumentStore } from './document-store.js';
import type { DocumentStoreOptions } from './document-store.js';

/**
 * Anything that turns texts into fixed-length vectors.
 */
export interface Embedder {
  /** One-time setup (model download, weights, warm-up) */
  load?(): Promise<void>;
  /** One embedding per text, in input order */
  embed(texts: string[]): Promise<number[][]>;
}

export interface EmbeddingStoreOptions extends DocumentStoreOptions {
  embedder: Embedder;
}

export interface AddDocumentsInput {
  texts: string[];
  ids?: string[];
  metadatas?: Array<Metadata | undefined>;
}

export interface AddDocumentInput {
  text: string;
  id?: string;
  metadata?: Metadata;
}

/**
 * @example
 * ```typescript
 * const store = new EmbeddingStore({
 *   config: { name: 'notes', dimension: 384, hybridWeight: 0.7 },
 *   embedder: myEmbedder,
 * });
 * await store.initialize();
 *
 * await store.addDocuments({ texts: ['The sky is blue', 'Grass is green'] });
 * const results = await store.search('what colour is the sky?');
 * ```
 */
export class EmbeddingStore {
  readonly store: DocumentStore;
  private embedder: Embedder;
  private loading?: Promise<void>;

  constructor(options: EmbeddingStoreOptions) {
    const { embedder, ...storeOptions } = options;
    this.store = new DocumentStore(storeOptions);
    this.embedder = embedder;
  }

  initialize(): Promise<void> {
    return this.store.initialize();
  }

  /**
   * Embed texts with the (lazily loaded) embedder.
   */
  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    await this.ensureLoaded();

    const embeddings = await this.embedder.embed(texts);
    if (!Array.isArray(embeddings) || embeddings.length !== texts.length) {
      throw new InvalidInputError(
        `Embedder returned ${Array.isArray(embeddings) ? embeddings.length : 0} embeddings for ${texts.length} texts`,
        { field: 'embeddings' }
      );
    }
    return embeddings;
  }

  async addDocuments(input: AddDocumentsInput): Promise<string[]> {
    const { texts, ids, metadatas } = input;
    // Checked before spending time on inference
    if (ids !== undefined && ids.length !== texts.length) {
      throw new InvalidInputError('Number of IDs must match number of texts', { field: 'ids' });
    }
    if (metadatas !== undefined && metadatas.length !== texts.length) {
      throw new InvalidInputError('Number of metadatas must match number of texts', { field: 'metadatas' });
    }

    const embeddings = await this.embed(texts);
    return this.store.addDocumentsWithEmbeddings({ texts, embeddings, ids, metadatas });
  }

  async addDocument(input: AddDocumentInput): Promise<string> {
    const [id] = await this.addDocuments({
      texts: [input.text],
      ids: input.id === undefined ? undefined : [input.id],
      metadatas: input.metadata === undefined ? undefined : [input.metadata],
    });
    return id;
  }

  /**
   * Hybrid search: embeds `query`, then ranks with cosine similarity and
   * BM25 over the same text.
   */
  async search(query: string, options: SearchOptions = {}): Promise<SearchResult[]> {
    const [embedding] = await this.embedQuery(query);
    return this.store.searchWithTextAndEmbedding(query, embedding, options);
  }

  /**
   * Raw and normalized embedding the store would search with for `query`.
   */
  async getQueryEmbedding(query: string): Promise<DocumentEmbedding> {
    const [raw] = await this.embedQuery(query);
    return { raw, normalized: normalize(raw) };
  }

  /**
   * Re-embed a document's new text. Metadata is kept unless given.
   */
  async updateDocument(id: string, text: string, metadata?: Metadata): Promise<void> {
    if (!this.store.documentExists(id)) {
      throw new InvalidInputError(`Document ${id} does not exist`, { field: 'id' });
    }
    const [embedding] = await this.embed([text]);
    await this.store.updateDocumentWithEmbedding(id, { text, embedding, metadata });
  }

  /**
   * Chunk `text`, embed each chunk and add it as a document tagged with
   * `originalFileID`, `chunkIndex`, `text` and `type: fileChunk`.
   */
  async ingestText(text: string, options: ChunkOptions = {}): Promise<IngestResult> {
    const chunks = chunkText(
      text,
      options.chunkSize ?? DEFAULT_CHUNK_SIZE,
      options.overlap ?? DEFAULT_CHUNK_OVERLAP
    );
    const embeddings = await this.embed(chunks);
    return this.store.addChunks({ chunks, embeddings, fileId: options.fileId });
  }

  /**
   * Read a UTF-8 text file and ingest it in chunks.
   */
  async ingestFile(path: string, options: ChunkOptions = {}): Promise<IngestResult> {
    let bytes: Uint8Array;
    try {
      bytes = await fs.readFile(path);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new InvalidInputError(`File could not be read: ${reason}`, { field: 'file' });
    }

    return this.ingestText(decodeUtf8(bytes, basename(path)), options);
  }

  documentCount(): number {
    return this.store.documentCount();
  }

  documentExists(id: string): boolean {
    return this.store.documentExists(id);
  }

  documentsExist(ids: readonly string[]): Map<string, boolean> {
    return this.store.documentsExist(ids);
  }

  getDocument(id: string): Document | undefined {
    return this.store.getDocument(id);
  }

  getDocumentEmbedding(id: string): DocumentEmbedding | undefined {
    return this.store.getDocumentEmbedding(id);
  }

  deleteDocuments(ids: readonly string[]): Promise<string[]> {
    return this.store.deleteDocuments(ids);
  }

  deleteDocumentsByFilter(filter: MetadataFilter): Promise<string[]> {
    return this.store.deleteDocumentsByFilter(filter);
  }

  reset(): Promise<void> {
    return this.store.reset();
  }

  private async embedQuery(query: string): Promise<number[][]> {
    if (typeof query !== 'string' || query.trim().length === 0) {
      throw new InvalidInputError('Query text must not be empty', { field: 'query' });
    }
    return this.embed([query]);
  }

  private async ensureLoaded(): Promise<void> {
    if (!this.embedder.load) return;

    if (!this.loading) {
      this.loading = this.embedder.load().catch((error: unknown) => {
        // Let the next call try again
        this.loading = undefined;
        throw error;
      });
    }
    await this.loading;
  }
}
