/**
 * Fixed-size text chunking with overlap.
 *
 * Offsets count user-perceived characters (grapheme clusters), so a chunk
 * boundary never splits a multi-byte character, an emoji sequence or a
 * combining accent from its base letter.
 */

import { CHUNK_DOCUMENT_TYPE } from '../constants.js';
import { InvalidInputError } from '../core/errors.js';
import type { Metadata } from '../types/index.js';

const segmenter = new Intl.Segmenter(undefined, { granularity: 'grapheme' });

/**
 * Split a string into grapheme clusters.
 */
export function toCharacters(text: string): string[] {
  return Array.from(segmenter.segment(text), (s) => s.segment);
}

/**
 * Split `text` into chunks of at most `chunkSize` characters, each starting
 * `overlap` characters before the previous chunk ended.
 *
 * @example
 * ```ts
 * chunkText('abcdefghij', 4, 1); // ['abcd', 'defg', 'ghij']
 * ```
 */
export function chunkText(text: string, chunkSize: number, overlap: number): string[] {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new InvalidInputError(`chunkSize must be a positive integer, got ${chunkSize}`, {
      field: 'chunkSize',
    });
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= chunkSize) {
    throw new InvalidInputError(
      `overlap must be an integer in [0, chunkSize), got ${overlap} (chunkSize ${chunkSize})`,
      { field: 'overlap' }
    );
  }

  const chars = toCharacters(text);
  const chunks: string[] = [];
  let start = 0;

  while (start < chars.length) {
    const end = Math.min(start + chunkSize, chars.length);
    chunks.push(chars.slice(start, end).join(''));
    if (end === chars.length) break;
    start = Math.max(end - overlap, 0);
  }

  return chunks;
}

/**
 * Metadata attached to every chunk document of one ingestion.
 */
export function buildChunkMetadata(fileId: string, chunks: readonly string[]): Metadata[] {
  return chunks.map((chunk, index) => ({
    originalFileID: fileId,
    chunkIndex: String(index),
    text: chunk,
    type: CHUNK_DOCUMENT_TYPE,
  }));
}

/**
 * Strict UTF-8 decode: invalid byte sequences are an input error instead of
 * being replaced with U+FFFD.
 */
export function decodeUtf8(bytes: Uint8Array, source = 'input'): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch {
    throw new InvalidInputError(`${source} could not be read as plain text (UTF-8)`, {
      field: 'file',
    });
  }
}
