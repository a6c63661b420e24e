import { InvalidArgumentError } from 'commander';
import { describe, it, expect } from 'vitest';
import {
  buildMockBatch,
  formatResults,
  parseEmbedding,
  parseFiniteNumber,
  parseKeyValues,
  parsePositiveInt,
  SAMPLE_TEXTS,
} from '../../src/cli/parse.js';
import { InvalidInputError } from '../../src/core/errors.js';
import { createColors } from '../../src/utils/colors.js';

const plain = createColors(false);

describe('parseEmbedding', () => {
  it('parses comma-separated values with surrounding spaces', () => {
    expect(parseEmbedding('0.1, 0.2,-3', 3)).toEqual([0.1, 0.2, -3]);
  });

  it('rejects non-numeric and empty values', () => {
    expect(() => parseEmbedding('1,x', 2)).toThrow('Embedding value #2 ("x") is not a number');
    expect(() => parseEmbedding('1,,2', 3)).toThrow('Embedding value #2 ("") is not a number');
  });

  it('rejects the wrong number of values', () => {
    expect(() => parseEmbedding('1,2', 3)).toThrow(InvalidInputError);
    expect(() => parseEmbedding('1,2', 3)).toThrow('Embedding must have exactly 3 values, got 2');
  });
});

describe('parseKeyValues', () => {
  it('splits at the first equals sign', () => {
    expect(parseKeyValues(['lang=en', 'query=a=b', 'empty='])).toEqual({ lang: 'en', query: 'a=b', empty: '' });
  });

  it('rejects pairs without a key', () => {
    expect(() => parseKeyValues(['lang'])).toThrow('Expected key=value in metadata, got "lang"');
    expect(() => parseKeyValues(['=en'], 'filter')).toThrow('Expected key=value in filter, got "=en"');
  });
});

describe('numeric option parsers', () => {
  it('parses positive integers', () => {
    expect(parsePositiveInt('5')).toBe(5);
    expect(() => parsePositiveInt('0')).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt('1.5')).toThrow(InvalidArgumentError);
  });

  it('parses finite numbers', () => {
    expect(parseFiniteNumber('-0.25')).toBe(-0.25);
    expect(() => parseFiniteNumber('abc')).toThrow(InvalidArgumentError);
    expect(() => parseFiniteNumber(' ')).toThrow(InvalidArgumentError);
  });
});

describe('formatResults', () => {
  it('reports an empty result set', () => {
    expect(formatResults([], plain)).toBe('No results found.');
  });

  it('lists each result with score, id, text and metadata', () => {
    const output = formatResults(
      [
        { id: 'doc-1', text: 'hello', score: 0.98766, createdAt: new Date(0), metadata: { lang: 'en', kind: 'note' } },
        { id: 'doc-2', text: 'world', score: 0.5, createdAt: new Date(0) },
      ],
      plain
    );

    expect(output.split('\n')).toEqual([
      'Found 2 results:',
      '',
      '1. Score: 0.9877',
      '   ID: doc-1',
      '   Text: hello',
      '   Metadata: lang=en, kind=note',
      '',
      '2. Score: 0.5000',
      '   ID: doc-2',
      '   Text: world',
    ]);
  });
});

describe('buildMockBatch', () => {
  it('builds sample documents with random embeddings in [-1, 1]', () => {
    const batch = buildMockBatch(12, 2, () => 0.75);

    expect(batch.texts).toHaveLength(12);
    expect(batch.texts[0]).toBe(`${SAMPLE_TEXTS[0]} 0`);
    expect(batch.texts[11]).toBe(`${SAMPLE_TEXTS[1]} 11`);
    expect(batch.embeddings[0]).toEqual([0.5, 0.5]);
    expect(batch.metadatas?.[4]).toEqual({ source: 'mock_data', index: '4', category: 'tech' });
  });
});
