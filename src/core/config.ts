/**
 * Store configuration: validation, defaults and storage location.
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import {
  DEFAULT_BM25_B,
  DEFAULT_BM25_K1,
  DEFAULT_HYBRID_WEIGHT,
  DEFAULT_NUM_RESULTS,
  DEFAULT_PERSIST_CONCURRENCY,
  STORAGE_ROOT_DIRNAME,
} from '../constants.js';
import { InvalidInputError } from './errors.js';

export const storeConfigSchema = z.object({
  /** Store name, also the storage subdirectory */
  name: z.string().min(1),
  /** Embedding length; immutable for the life of the store */
  dimension: z.number().int().positive(),
  defaultNumResults: z.number().int().positive().default(DEFAULT_NUM_RESULTS),
  /** Minimum cosine similarity applied when a search passes no threshold */
  minThreshold: z.number().finite().optional(),
  /** 1 = pure vector, 0 = pure BM25 */
  hybridWeight: z.number().min(0).max(1).default(DEFAULT_HYBRID_WEIGHT),
  k1: z.number().positive().default(DEFAULT_BM25_K1),
  b: z.number().min(0).max(1).default(DEFAULT_BM25_B),
  /** Parent directory of the store; the store lives in `<directory>/<name>` */
  directory: z.string().min(1).optional(),
  /** Per-document writes a batch runs at once */
  persistConcurrency: z.number().int().positive().default(DEFAULT_PERSIST_CONCURRENCY),
});

export type StoreConfigInput = z.input<typeof storeConfigSchema>;
export type StoreConfig = Readonly<z.output<typeof storeConfigSchema>>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Parse a config, applying defaults.
 *
 * @example
 * ```ts
 * const config = resolveStoreConfig({ name: 'notes', dimension: 384 });
 * config.hybridWeight; // 0.5
 * ```
 */
export function resolveStoreConfig(input: StoreConfigInput): StoreConfig {
  const result = storeConfigSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidInputError(`Invalid store config: ${describeIssues(result.error)}`, {
      field: 'config',
    });
  }
  return Object.freeze(result.data);
}

/**
 * Platform-conventional data directory for a named store.
 */
export function defaultStorageDirectory(
  name: string,
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform
): string {
  const home = env.HOME || env.USERPROFILE || homedir();

  switch (platform) {
    case 'darwin':
      return join(home, 'Library', 'Application Support', STORAGE_ROOT_DIRNAME, name);
    case 'win32':
      return join(env.APPDATA || join(home, 'AppData', 'Roaming'), STORAGE_ROOT_DIRNAME, name);
    default:
      return join(env.XDG_DATA_HOME || join(home, '.local', 'share'), STORAGE_ROOT_DIRNAME, name);
  }
}

/**
 * Directory a store persists into: `<directory>/<name>` when overridden,
 * otherwise the platform default.
 */
export function resolveStorageDirectory(config: Pick<StoreConfig, 'name' | 'directory'>): string {
  return config.directory ? join(config.directory, config.name) : defaultStorageDirectory(config.name);
}
