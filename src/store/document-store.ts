/**
 * DocumentStore - embedded hybrid search over precomputed embeddings.
 *
 * Owns three pieces of state that must move together:
 * - the document table (source of truth)
 * - the normalized-embedding cache (one entry per document id)
 * - the BM25 lexical index (rebuilt from the table on every mutation)
 *
 * Every mutation runs through a single-writer queue. Its in-memory part is
 * synchronous, so readers never observe a half-applied change; persistence
 * is issued only after the in-memory commit and is not rolled back on
 * failure.
 */

import { randomUUID } from 'node:crypto';
import { resolveStorageDirectory, resolveStoreConfig } from '../core/config.js';
import type { StoreConfig, StoreConfigInput } from '../core/config.js';
import {
  DimensionMismatchError,
  InvalidInputError,
  LoadFailedError,
  PersistenceError,
  StateError,
} from '../core/errors.js';
import type { PersistenceFailure, PersistenceOperation } from '../core/errors.js';
import { buildChunkMetadata } from '../ingest/chunker.js';
import { LexicalIndex } from '../search/bm25.js';
import { assertValidFilter, matchesFilter, metadataSchema } from '../search/filter.js';
import { hybridScore } from '../search/hybrid.js';
import { FileStorage } from '../storage/file-storage.js';
import type { PersistenceAdapter } from '../storage/types.js';
import { silentLogger } from '../types/logger.js';
import type {
  AddWithEmbeddingInput,
  AddWithEmbeddingsInput,
  Document,
  DocumentEmbedding,
  IngestResult,
  Logger,
  Metadata,
  MetadataFilter,
  SearchOptions,
  SearchResult,
} from '../types/index.js';
import { TaskPool } from '../utils/task-pool.js';
import { dot, normalize } from '../vector/math.js';

export interface DocumentStoreOptions {
  config: StoreConfigInput;
  /**
   * Where documents are persisted.
   * Defaults to a FileStorage in the store's storage directory.
   */
  storage?: PersistenceAdapter;
  /** Defaults to a silent logger */
  logger?: Logger;
}

export interface UpdateWithEmbeddingInput {
  text: string;
  embedding: number[];
  /** Replaces the previous metadata; omitted keeps it */
  metadata?: Metadata;
}

export interface AddChunksInput {
  chunks: string[];
  embeddings: number[][];
  /** Shared originalFileID (default: a fresh UUID) */
  fileId?: string;
}

type StoreState = 'created' | 'ready';

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Highest score first; equal scores by ascending id.
 */
export function compareResults(a: SearchResult, b: SearchResult): number {
  return b.score - a.score || compareIds(a.id, b.id);
}

/**
 * @example
 * ```typescript
 * const store = new DocumentStore({ config: { name: 'notes', dimension: 3 } });
 * await store.initialize();
 *
 * await store.addDocumentsWithEmbeddings({
 *   texts: ['red apple', 'green pear'],
 *   embeddings: [[1, 0, 0], [0, 1, 0]],
 *   metadatas: [{ kind: 'fruit' }, { kind: 'fruit' }],
 * });
 *
 * const results = await store.search([0.9, 0.1, 0], { numResults: 1 });
 * console.log(results[0].text); // 'red apple'
 * ```
 */
export class DocumentStore {
  readonly config: StoreConfig;
  readonly storage: PersistenceAdapter;
  private logger: Logger;
  private documents: Map<string, Document> = new Map();
  private normalizedEmbeddings: Map<string, number[]> = new Map();
  private lexicalIndex: LexicalIndex | null = null;
  private writer = new TaskPool({ concurrency: 1 });
  private persistPool: TaskPool;
  private state: StoreState = 'created';

  constructor(options: DocumentStoreOptions) {
    this.config = resolveStoreConfig(options.config);
    this.storage = options.storage ?? new FileStorage({ path: resolveStorageDirectory(this.config) });
    this.logger = options.logger ?? silentLogger;
    this.persistPool = new TaskPool({ concurrency: this.config.persistConcurrency });
  }

  get dimension(): number {
    return this.config.dimension;
  }

  get isReady(): boolean {
    return this.state === 'ready';
  }

  /**
   * Load every persisted document and build the caches from scratch.
   *
   * Records that fail to decode are skipped. After everything else is
   * loaded and the store is usable, a single LoadFailedError lists them.
   * Calling it again on a ready store does nothing.
   */
  async initialize(): Promise<void> {
    return this.writer.run(async () => {
      if (this.state === 'ready') return;

      const { documents, failures } = await this.storage.loadAll();

      for (const doc of documents) {
        if (doc.embedding.length !== this.config.dimension) {
          failures.push({
            source: doc.id,
            reason: new DimensionMismatchError(this.config.dimension, doc.embedding.length).message,
          });
          continue;
        }
        this.insert(doc);
      }
      this.rebuildIndex();
      this.state = 'ready';

      this.logger.debug(
        { store: this.config.name, loaded: this.documents.size, failed: failures.length },
        'store initialized'
      );

      if (failures.length > 0) {
        this.logger.warn(
          { store: this.config.name, failures: failures.map((f) => f.source) },
          'skipped unreadable document records'
        );
        throw new LoadFailedError(failures);
      }
    });
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  documentCount(): number {
    this.ensureReady();
    return this.documents.size;
  }

  documentExists(id: string): boolean {
    this.ensureReady();
    return this.documents.has(id);
  }

  /**
   * Existence of each id, in the order given.
   */
  documentsExist(ids: readonly string[]): Map<string, boolean> {
    this.ensureReady();
    return new Map(ids.map((id) => [id, this.documents.has(id)]));
  }

  getDocument(id: string): Document | undefined {
    this.ensureReady();
    return this.documents.get(id);
  }

  /**
   * Stored raw embedding and its cached normalized form.
   */
  getDocumentEmbedding(id: string): DocumentEmbedding | undefined {
    this.ensureReady();
    const doc = this.documents.get(id);
    const normalized = this.normalizedEmbeddings.get(id);
    if (!doc || !normalized) return undefined;
    return { raw: [...doc.embedding], normalized: [...normalized] };
  }

  /**
   * Rank documents by cosine similarity to `queryEmbedding`.
   */
  async search(queryEmbedding: number[], options: SearchOptions = {}): Promise<SearchResult[]> {
    this.ensureReady();
    this.validateEmbedding(queryEmbedding, 'query');
    this.validateSearchOptions(options);
    return this.rank(normalize(queryEmbedding), undefined, options);
  }

  /**
   * Rank documents by the hybrid of cosine similarity and the BM25 score of
   * `queryText`, weighted by `config.hybridWeight`.
   */
  async searchWithTextAndEmbedding(
    queryText: string,
    queryEmbedding: number[],
    options: SearchOptions = {}
  ): Promise<SearchResult[]> {
    this.ensureReady();
    if (typeof queryText !== 'string' || queryText.trim().length === 0) {
      throw new InvalidInputError('Query text must not be empty', { field: 'queryText' });
    }
    this.validateEmbedding(queryEmbedding, 'query');
    this.validateSearchOptions(options);
    return this.rank(normalize(queryEmbedding), queryText, options);
  }

  // ---------------------------------------------------------------------------
  // Mutations
  // ---------------------------------------------------------------------------

  /**
   * Add a batch of documents with precomputed embeddings.
   *
   * The whole batch is validated before anything changes. Existing ids are
   * replaced. Returns the ids in input order, generating missing ones.
   */
  async addDocumentsWithEmbeddings(input: AddWithEmbeddingsInput): Promise<string[]> {
    this.ensureReady();
    const docs = this.buildDocuments(input);

    return this.writer.run(async () => {
      for (const doc of docs) {
        this.insert(doc);
      }
      this.rebuildIndex();
      this.logger.debug({ store: this.config.name, added: docs.length, total: this.documents.size }, 'documents added');

      // A repeated id is written once, with its last occurrence
      const latest = Array.from(new Map(docs.map((doc) => [doc.id, doc])).values());
      await this.persist('save', latest, (doc) => this.storage.save(doc));
      return docs.map((doc) => doc.id);
    });
  }

  async addDocumentWithEmbedding(input: AddWithEmbeddingInput): Promise<string> {
    const [id] = await this.addDocumentsWithEmbeddings({
      texts: [input.text],
      embeddings: [input.embedding],
      ids: input.id === undefined ? undefined : [input.id],
      metadatas: input.metadata === undefined ? undefined : [input.metadata],
    });
    return id;
  }

  /**
   * Add pre-chunked text, tagging each chunk with its file id and index.
   */
  async addChunks(input: AddChunksInput): Promise<IngestResult> {
    const fileId = input.fileId ?? randomUUID();
    const ids = await this.addDocumentsWithEmbeddings({
      texts: input.chunks,
      embeddings: input.embeddings,
      metadatas: buildChunkMetadata(fileId, input.chunks),
    });
    return { fileId, ids };
  }

  /**
   * Replace a document's text and embedding, keeping its id and (unless
   * given) its metadata. Unknown ids are rejected.
   */
  async updateDocumentWithEmbedding(id: string, input: UpdateWithEmbeddingInput): Promise<void> {
    this.ensureReady();
    this.validateEmbedding(input.embedding, 'embedding');
    if (typeof input.text !== 'string') {
      throw new InvalidInputError('Document text must be a string', { field: 'text' });
    }
    if (input.metadata !== undefined) {
      assertValidFilter(input.metadata, 'metadata');
    }

    const embedding = [...input.embedding];
    const metadata = input.metadata === undefined ? undefined : { ...input.metadata };

    return this.writer.run(async () => {
      const existing = this.documents.get(id);
      if (!existing) {
        throw new InvalidInputError(`Document ${id} does not exist`, { field: 'id' });
      }

      const replacement: Document = {
        id,
        text: input.text,
        embedding,
        createdAt: new Date(),
        ...this.metadataField(metadata ?? existing.metadata),
      };

      this.remove(id);
      this.insert(replacement);
      this.rebuildIndex();
      this.logger.debug({ store: this.config.name, id }, 'document updated');

      await this.persist('save', [replacement], (doc) => this.storage.save(doc));
    });
  }

  /**
   * Delete documents by id. Unknown ids are ignored.
   * Returns the ids that were removed.
   */
  async deleteDocuments(ids: readonly string[]): Promise<string[]> {
    this.ensureReady();
    if (!Array.isArray(ids) || ids.some((id) => typeof id !== 'string')) {
      throw new InvalidInputError('ids must be an array of strings', { field: 'ids' });
    }
    const requested = [...ids];

    return this.writer.run(() => this.deleteCommitted(requested));
  }

  /**
   * Delete every document whose metadata matches `filter`.
   * An empty filter is rejected; use reset() to remove everything.
   */
  async deleteDocumentsByFilter(filter: MetadataFilter): Promise<string[]> {
    this.ensureReady();
    assertValidFilter(filter);
    if (Object.keys(filter).length === 0) {
      throw new InvalidInputError('At least one filter key must be specified', { field: 'filter' });
    }
    const criteria = { ...filter };

    return this.writer.run(() => {
      const ids: string[] = [];
      for (const doc of this.documents.values()) {
        if (matchesFilter(doc.metadata, criteria)) {
          ids.push(doc.id);
        }
      }
      return this.deleteCommitted(ids);
    });
  }

  /**
   * Remove every document and every persisted record.
   */
  async reset(): Promise<void> {
    this.ensureReady();

    return this.writer.run(async () => {
      this.documents.clear();
      this.normalizedEmbeddings.clear();
      this.lexicalIndex = null;
      this.logger.debug({ store: this.config.name }, 'store reset');

      try {
        await this.storage.clear();
      } catch (error) {
        throw new PersistenceError('clear', [{ cause: error }]);
      }
    });
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private ensureReady(): void {
    if (this.state !== 'ready') {
      throw new StateError(`Store "${this.config.name}" is not initialized. Call initialize() first.`, {
        expectedState: 'ready',
        actualState: this.state,
      });
    }
  }

  private validateEmbedding(embedding: unknown, field: string): asserts embedding is number[] {
    if (!Array.isArray(embedding) || embedding.length === 0) {
      throw new InvalidInputError(`${field} embedding must be a non-empty array of numbers`, { field });
    }
    if (embedding.length !== this.config.dimension) {
      throw new DimensionMismatchError(this.config.dimension, embedding.length);
    }
    if (!embedding.every((value) => typeof value === 'number' && Number.isFinite(value))) {
      throw new InvalidInputError(`${field} embedding must contain only finite numbers`, { field });
    }
  }

  private validateSearchOptions(options: SearchOptions): void {
    const { numResults, threshold, filter } = options;
    if (numResults !== undefined && (!Number.isInteger(numResults) || numResults < 0)) {
      throw new InvalidInputError(`numResults must be a non-negative integer, got ${numResults}`, {
        field: 'numResults',
      });
    }
    if (threshold !== undefined && !Number.isFinite(threshold)) {
      throw new InvalidInputError(`threshold must be a finite number, got ${threshold}`, { field: 'threshold' });
    }
    if (filter !== undefined) {
      assertValidFilter(filter);
    }
  }

  /**
   * Validate a batch in order (ids, metadatas, embeddings count, each
   * embedding's dimension) and build its documents. Nothing is mutated.
   */
  private buildDocuments(input: AddWithEmbeddingsInput): Document[] {
    const { texts, embeddings, ids, metadatas } = input;

    if (!Array.isArray(texts) || texts.some((text) => typeof text !== 'string')) {
      throw new InvalidInputError('texts must be an array of strings', { field: 'texts' });
    }
    if (ids !== undefined && ids.length !== texts.length) {
      throw new InvalidInputError('Number of IDs must match number of texts', { field: 'ids' });
    }
    if (metadatas !== undefined && metadatas.length !== texts.length) {
      throw new InvalidInputError('Number of metadatas must match number of texts', { field: 'metadatas' });
    }
    if (!Array.isArray(embeddings) || embeddings.length !== texts.length) {
      throw new InvalidInputError('Number of texts must match number of embeddings', { field: 'embeddings' });
    }
    for (const embedding of embeddings) {
      this.validateEmbedding(embedding, 'document');
    }
    if (ids !== undefined && ids.some((id) => typeof id !== 'string' || id.length === 0)) {
      throw new InvalidInputError('IDs must be non-empty strings', { field: 'ids' });
    }
    for (const metadata of metadatas ?? []) {
      if (metadata !== undefined && !metadataSchema.safeParse(metadata).success) {
        throw new InvalidInputError('Metadata values must be strings', { field: 'metadatas' });
      }
    }

    const createdAt = new Date();
    return texts.map((text, i): Document => ({
      id: ids?.[i] ?? randomUUID(),
      text,
      embedding: [...embeddings[i]],
      createdAt,
      ...this.metadataField(metadatas?.[i]),
    }));
  }

  private metadataField(metadata: Readonly<Metadata> | undefined): { metadata?: Metadata } {
    return metadata === undefined ? {} : { metadata: { ...metadata } };
  }

  /**
   * Insert a document and its cache entry in one step.
   */
  private insert(doc: Document): void {
    this.documents.set(doc.id, doc);
    this.normalizedEmbeddings.set(doc.id, normalize(doc.embedding));
  }

  /**
   * Remove a document and its cache entry in one step.
   */
  private remove(id: string): boolean {
    this.normalizedEmbeddings.delete(id);
    return this.documents.delete(id);
  }

  private rebuildIndex(): void {
    this.lexicalIndex =
      this.documents.size === 0
        ? null
        : new LexicalIndex(this.documents.values(), { k1: this.config.k1, b: this.config.b });
  }

  private async deleteCommitted(ids: readonly string[]): Promise<string[]> {
    const removed = Array.from(new Set(ids)).filter((id) => this.remove(id));
    if (removed.length === 0) return removed;

    this.rebuildIndex();
    this.logger.debug({ store: this.config.name, deleted: removed.length, total: this.documents.size }, 'documents deleted');

    await this.persist('delete', removed, (id) => this.storage.delete(id));
    return removed;
  }

  /**
   * Fan persistence out across the batch. Runs after the in-memory commit;
   * failures are collected and raised once without rolling anything back.
   */
  private async persist<T extends Document | string>(
    operation: PersistenceOperation,
    items: readonly T[],
    write: (item: T) => Promise<void>
  ): Promise<void> {
    const outcomes = await this.persistPool.settleAll(items, write);
    const failures: PersistenceFailure[] = [];

    outcomes.forEach((outcome, i) => {
      if (outcome.status === 'rejected') {
        const item = items[i];
        failures.push({ id: typeof item === 'string' ? item : item.id, cause: outcome.reason });
      }
    });

    if (failures.length > 0) {
      this.logger.error(
        { store: this.config.name, operation, failed: failures.map((f) => f.id) },
        'persistence failed; in-memory state is ahead of storage'
      );
      throw new PersistenceError(operation, failures);
    }
  }

  private lexicalScores(queryText: string): Map<string, number> {
    const scores = new Map<string, number>();
    if (!this.lexicalIndex) return scores;

    for (const hit of this.lexicalIndex.search(queryText)) {
      scores.set(hit.id, hit.score);
    }
    return scores;
  }

  /**
   * Score every filter-matching document against a normalized query.
   * Synchronous: it always sees the last committed mutation.
   */
  private rank(normalizedQuery: number[], queryText: string | undefined, options: SearchOptions): SearchResult[] {
    const threshold = options.threshold ?? this.config.minThreshold ?? 0;
    const limit = options.numResults ?? this.config.defaultNumResults;
    const bm25 = queryText === undefined ? undefined : this.lexicalScores(queryText);

    const results: SearchResult[] = [];
    for (const [id, doc] of this.documents) {
      if (!matchesFilter(doc.metadata, options.filter)) continue;

      const normalized = this.normalizedEmbeddings.get(id);
      if (!normalized) continue;

      const similarity = dot(normalizedQuery, normalized);
      if (similarity < threshold) continue;

      results.push({
        id,
        text: doc.text,
        score: hybridScore(similarity, bm25 ? (bm25.get(id) ?? 0) : undefined, this.config.hybridWeight),
        createdAt: doc.createdAt,
        ...this.metadataField(doc.metadata),
      });
    }

    this.logger.debug(
      { store: this.config.name, candidates: this.documents.size, matched: results.length, hybrid: bm25 !== undefined },
      'search ranked'
    );

    return results.sort(compareResults).slice(0, limit);
  }
}
