export class NearstoreError extends Error {
  suggestions: string[];
  retriable: boolean;

  constructor(message: string, suggestions: string[] = [], retriable = false) {
    super(message);
    this.name = 'NearstoreError';
    this.suggestions = suggestions;
    this.retriable = retriable;
  }
}

/**
 * Thrown when an embedding's length differs from the store dimension,
 * for inserts and queries alike.
 */
export class DimensionMismatchError extends NearstoreError {
  expected: number;
  got: number;

  constructor(expected: number, got: number) {
    super(
      `Dimension mismatch: expected ${expected}, got ${got}`,
      [
        'Check that the embedding model matches the dimension the store was created with.',
        'Create a new store if the embedding model changed.'
      ]
    );
    this.name = 'DimensionMismatchError';
    this.expected = expected;
    this.got = got;
  }
}

/**
 * Error thrown when input validation fails
 */
export class InvalidInputError extends NearstoreError {
  field?: string;

  constructor(message: string, options?: { field?: string }) {
    super(
      message,
      [
        'Check the input format and constraints.',
        'Batch arrays (texts, embeddings, ids, metadatas) must have the same length.'
      ]
    );
    this.name = 'InvalidInputError';
    this.field = options?.field;
  }
}

export interface LoadFailure {
  /** Record that could not be loaded (file name or key) */
  source: string;
  reason: string;
}

/**
 * Aggregate of every persisted record that failed to load at startup.
 * The store stays usable with the records that did load.
 */
export class LoadFailedError extends NearstoreError {
  failures: LoadFailure[];

  constructor(failures: LoadFailure[]) {
    const details = failures.map((f) => `Failed to load ${f.source}: ${f.reason}`).join('\n');
    super(
      `${failures.length} document record(s) could not be loaded:\n${details}`,
      [
        'Inspect or remove the listed records from the storage directory.',
        'All other documents were loaded and the store is usable.'
      ]
    );
    this.name = 'LoadFailedError';
    this.failures = failures;
  }
}

export type PersistenceOperation = 'save' | 'delete' | 'clear';

export interface PersistenceFailure {
  id?: string;
  cause: unknown;
}

/**
 * Persistence failed after the in-memory state was already committed.
 * Memory is ahead of disk until the records are written again.
 */
export class PersistenceError extends NearstoreError {
  operation: PersistenceOperation;
  failures: PersistenceFailure[];

  constructor(operation: PersistenceOperation, failures: PersistenceFailure[]) {
    const ids = failures.map((f) => f.id).filter((id): id is string => id !== undefined);
    const target = ids.length > 0 ? ` for ${ids.join(', ')}` : '';
    const first = failures[0]?.cause;
    const reason = first instanceof Error ? `: ${first.message}` : '';
    super(
      `Persistence ${operation} failed${target}${reason}`,
      [
        'Check permissions and free space of the storage directory.',
        'In-memory state was not rolled back; repeat the operation to persist it.'
      ]
    );
    this.name = 'PersistenceError';
    this.operation = operation;
    this.failures = failures;
  }
}

export class StateError extends NearstoreError {
  expectedState?: string;
  actualState?: string;

  constructor(
    message: string,
    options?: {
      expectedState?: string;
      actualState?: string;
    }
  ) {
    super(
      message,
      [
        'Ensure the required setup/initialization step was performed.',
        'Check that operations are called in the correct order.'
      ]
    );
    this.name = 'StateError';
    this.expectedState = options?.expectedState;
    this.actualState = options?.actualState;
  }
}
