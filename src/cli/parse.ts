/**
 * Argument parsing and output formatting for the nearstore CLI.
 */

import { InvalidArgumentError } from 'commander';
import { InvalidInputError } from '../core/errors.js';
import type { AddWithEmbeddingsInput, Metadata, SearchResult } from '../types/index.js';
import type { Colors } from '../utils/colors.js';

export const SAMPLE_TEXTS = [
  'The quick brown fox jumps over the lazy dog',
  'Machine learning is transforming the world',
  'Vector databases enable semantic search',
  'TypeScript adds static types to JavaScript',
  'Artificial intelligence is the future',
  'Data science drives business decisions',
  'Cloud computing scales applications',
  'Mobile apps connect people globally',
  'Open source software powers innovation',
  'Natural language processing understands text',
] as const;

const MOCK_CATEGORIES = ['tech', 'ai', 'programming', 'data'] as const;

/**
 * Commander option parser for positive integers.
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`Expected a positive integer, got "${value}".`);
  }
  return parsed;
}

/**
 * Commander option parser for finite numbers.
 */
export function parseFiniteNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`Expected a number, got "${value}".`);
  }
  return parsed;
}

/**
 * Parse "0.1, 0.2,0.3" into a vector of exactly `dimension` values.
 */
export function parseEmbedding(value: string, dimension: number): number[] {
  const parts = value.split(',').map((part) => part.trim());
  const values = parts.map((part) => (part === '' ? Number.NaN : Number(part)));

  const badIndex = values.findIndex((v) => !Number.isFinite(v));
  if (badIndex !== -1) {
    throw new InvalidInputError(`Embedding value #${badIndex + 1} ("${parts[badIndex]}") is not a number`, {
      field: 'embedding',
    });
  }
  if (values.length !== dimension) {
    throw new InvalidInputError(`Embedding must have exactly ${dimension} values, got ${values.length}`, {
      field: 'embedding',
    });
  }
  return values;
}

/**
 * Parse repeated `key=value` arguments. The value may itself contain '='.
 */
export function parseKeyValues(items: readonly string[], field = 'metadata'): Metadata {
  const result: Metadata = {};
  for (const item of items) {
    const separator = item.indexOf('=');
    if (separator <= 0) {
      throw new InvalidInputError(`Expected key=value in ${field}, got "${item}"`, { field });
    }
    result[item.slice(0, separator)] = item.slice(separator + 1);
  }
  return result;
}

export function formatMetadata(metadata: Metadata): string {
  return Object.entries(metadata)
    .map(([key, value]) => `${key}=${value}`)
    .join(', ');
}

export function formatResults(results: readonly SearchResult[], colors: Colors): string {
  if (results.length === 0) {
    return colors.yellow('No results found.');
  }

  const lines = [colors.bold(`Found ${results.length} results:`)];
  results.forEach((result, index) => {
    lines.push('');
    lines.push(`${index + 1}. Score: ${colors.green(result.score.toFixed(4))}`);
    lines.push(`   ID: ${colors.cyan(result.id)}`);
    lines.push(`   Text: ${result.text}`);
    if (result.metadata && Object.keys(result.metadata).length > 0) {
      lines.push(`   Metadata: ${colors.gray(formatMetadata(result.metadata))}`);
    }
  });
  return lines.join('\n');
}

/**
 * Sample documents with random embeddings in [-1, 1].
 */
export function buildMockBatch(
  count: number,
  dimension: number,
  random: () => number = Math.random
): AddWithEmbeddingsInput {
  const texts: string[] = [];
  const embeddings: number[][] = [];
  const metadatas: Metadata[] = [];

  for (let i = 0; i < count; i++) {
    texts.push(`${SAMPLE_TEXTS[i % SAMPLE_TEXTS.length]} ${i}`);
    embeddings.push(Array.from({ length: dimension }, () => random() * 2 - 1));
    metadatas.push({
      source: 'mock_data',
      index: String(i),
      category: MOCK_CATEGORIES[i % MOCK_CATEGORIES.length],
    });
  }

  return { texts, embeddings, metadatas };
}
