import { z } from 'zod';
import { InvalidInputError } from '../core/errors.js';
import type { Metadata, MetadataFilter } from '../types/index.js';

export const metadataSchema = z.record(z.string(), z.string());

/**
 * True when `filter` is absent, or when `metadata` is present and holds
 * every filter key with an equal value.
 *
 * @example
 * ```ts
 * matchesFilter({ lang: 'en', kind: 'faq' }, { lang: 'en' }); // true
 * matchesFilter(undefined, { lang: 'en' });                   // false
 * matchesFilter(undefined, undefined);                        // true
 * ```
 */
export function matchesFilter(
  metadata: Readonly<Metadata> | undefined,
  filter: MetadataFilter | undefined
): boolean {
  if (!filter) return true;
  if (!metadata) return false;

  for (const [key, value] of Object.entries(filter)) {
    if (!Object.prototype.hasOwnProperty.call(metadata, key) || metadata[key] !== value) {
      return false;
    }
  }
  return true;
}

/**
 * Validate a filter supplied at runtime (string keys to string values).
 */
export function assertValidFilter(filter: unknown, field = 'filter'): asserts filter is MetadataFilter {
  const result = metadataSchema.safeParse(filter);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue && issue.path.length > 0 ? `.${issue.path.join('.')}` : '';
    throw new InvalidInputError(
      `Malformed ${field}${path}: ${issue?.message ?? 'expected an object of string values'}`,
      { field }
    );
  }
}
