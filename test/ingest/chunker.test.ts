import { describe, it, expect } from 'vitest';
import { InvalidInputError } from '../../src/core/errors.js';
import { buildChunkMetadata, chunkText, decodeUtf8, toCharacters } from '../../src/ingest/chunker.js';

describe('chunkText', () => {
  it('splits into overlapping fixed-size chunks', () => {
    expect(chunkText('abcdefghij', 4, 1)).toEqual(['abcd', 'defg', 'ghij']);
  });

  it('splits without overlap', () => {
    expect(chunkText('abcdef', 2, 0)).toEqual(['ab', 'cd', 'ef']);
  });

  it('returns a single chunk for short text and none for empty text', () => {
    expect(chunkText('abc', 10, 0)).toEqual(['abc']);
    expect(chunkText('', 4, 1)).toEqual([]);
  });

  it('never splits a grapheme cluster', () => {
    const text = 'café👍🏽ok';

    expect(toCharacters(text)).toHaveLength(7);
    expect(chunkText(text, 3, 0)).toEqual(['caf', 'é👍🏽o', 'k']);
  });

  it('reconstructs the input once overlaps are removed', () => {
    const text = 'The quick brown fox jumps over the lazy dog';
    const overlap = 3;
    const chunks = chunkText(text, 8, overlap);

    const rebuilt = chunks[0] + chunks.slice(1).map((chunk) => chunk.slice(overlap)).join('');
    expect(rebuilt).toBe(text);
  });

  it('rejects invalid sizes', () => {
    expect(() => chunkText('abc', 0, 0)).toThrow(InvalidInputError);
    expect(() => chunkText('abc', 2.5, 0)).toThrow(InvalidInputError);
    expect(() => chunkText('abc', 4, 4)).toThrow('overlap must be an integer in [0, chunkSize), got 4 (chunkSize 4)');
    expect(() => chunkText('abc', 4, -1)).toThrow(InvalidInputError);
  });
});

describe('buildChunkMetadata', () => {
  it('tags every chunk with its file id and position', () => {
    expect(buildChunkMetadata('file-1', ['first', 'second'])).toEqual([
      { originalFileID: 'file-1', chunkIndex: '0', text: 'first', type: 'fileChunk' },
      { originalFileID: 'file-1', chunkIndex: '1', text: 'second', type: 'fileChunk' },
    ]);
  });
});

describe('decodeUtf8', () => {
  it('decodes valid UTF-8', () => {
    expect(decodeUtf8(new TextEncoder().encode('héllo wörld'))).toBe('héllo wörld');
  });

  it('rejects invalid byte sequences', () => {
    expect(() => decodeUtf8(new Uint8Array([0x68, 0xff, 0xfe]), 'notes.bin')).toThrow(
      'notes.bin could not be read as plain text (UTF-8)'
    );
  });
});
