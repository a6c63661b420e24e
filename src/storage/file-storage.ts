import { randomUUID } from 'node:crypto';
import { promises as fs, existsSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { RECORD_FILE_EXTENSION } from '../constants.js';
import type { LoadFailure } from '../core/errors.js';
import type { Document } from '../types/index.js';
import { decodeDocument, describeError, encodeDocument } from './codec.js';
import type { LoadResult, PersistenceAdapter } from './types.js';

export interface FileStorageOptions {
  /**
   * Directory holding one `<id>.json` record per document.
   * Created (recursively) if it does not exist.
   */
  path: string;
}

// Lower-case only: `A` and `a` must not share a file on case-insensitive filesystems
const SAFE_ID = /^[a-z0-9][a-z0-9_-]*$/;

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * File-based PersistenceAdapter.
 * Each document is a pretty-printed JSON file named after its id.
 * Other ids (including any with upper-case letters) are stored as
 * `_<hex(id)>.json`.
 */
export class FileStorage implements PersistenceAdapter {
  readonly directory: string;

  constructor(options: FileStorageOptions) {
    this.directory = options.path;
    this.initDirectory();
  }

  private initDirectory(): void {
    if (!existsSync(this.directory)) {
      mkdirSync(this.directory, { recursive: true });
    }
  }

  /**
   * Path of the record for `id`.
   */
  getFilePath(id: string): string {
    const name = SAFE_ID.test(id) ? id : `_${Buffer.from(id).toString('hex')}`;
    return join(this.directory, name + RECORD_FILE_EXTENSION);
  }

  async loadAll(): Promise<LoadResult> {
    let files: string[];
    try {
      files = await fs.readdir(this.directory);
    } catch (error) {
      if (isMissing(error)) {
        return { documents: [], failures: [] };
      }
      throw error;
    }

    const recordFiles = files.filter((file) => file.endsWith(RECORD_FILE_EXTENSION)).sort();
    const outcomes = await Promise.all(
      recordFiles.map(async (file): Promise<Document | LoadFailure> => {
        try {
          const content = await fs.readFile(join(this.directory, file), 'utf8');
          return decodeDocument(content);
        } catch (error) {
          return { source: file, reason: describeError(error) };
        }
      })
    );

    const documents: Document[] = [];
    const failures: LoadFailure[] = [];
    for (const outcome of outcomes) {
      if ('source' in outcome) {
        failures.push(outcome);
      } else {
        documents.push(outcome);
      }
    }

    return { documents, failures };
  }

  async save(document: Document): Promise<void> {
    const filePath = this.getFilePath(document.id);
    // Write beside the record and rename so a crash never leaves a torn file.
    // The temp name is unique per write: concurrent saves of one id must not share it.
    const tmpPath = `${filePath}.${process.pid}.${randomUUID()}.tmp`;

    await fs.writeFile(tmpPath, encodeDocument(document), 'utf8');
    try {
      await fs.rename(tmpPath, filePath);
    } catch (error) {
      await fs.rm(tmpPath, { force: true });
      throw error;
    }
  }

  async delete(id: string): Promise<void> {
    try {
      await fs.unlink(this.getFilePath(id));
    } catch (error) {
      if (!isMissing(error)) {
        throw error;
      }
    }
  }

  async clear(): Promise<void> {
    let files: string[];
    try {
      files = await fs.readdir(this.directory);
    } catch (error) {
      if (isMissing(error)) return;
      throw error;
    }

    for (const file of files) {
      await fs.rm(join(this.directory, file), { recursive: true, force: true });
    }
  }
}
