import { describe, it, expect } from 'vitest';
import { decodeDocument, encodeDocument } from '../../src/storage/codec.js';
import type { Document } from '../../src/types/index.js';

const doc: Document = {
  id: 'doc-1',
  text: 'hello world',
  embedding: [0.1, -0.2, 3],
  createdAt: new Date('2024-05-01T12:30:00.000Z'),
  metadata: { lang: 'en' },
};

describe('document codec', () => {
  it('writes a pretty-printed self-describing record', () => {
    expect(JSON.parse(encodeDocument(doc))).toEqual({
      id: 'doc-1',
      text: 'hello world',
      embedding: [0.1, -0.2, 3],
      createdAt: '2024-05-01T12:30:00.000Z',
      metadata: { lang: 'en' },
    });
    expect(encodeDocument(doc)).toContain('\n  "id": "doc-1"');
  });

  it('reads back what it writes', () => {
    const decoded = decodeDocument(encodeDocument(doc));

    expect(decoded).toEqual(doc);
    expect(decoded.createdAt.getTime()).toBe(doc.createdAt.getTime());
  });

  it('omits absent and null metadata', () => {
    const record = {
      id: 'doc-2',
      text: '',
      embedding: [1],
      createdAt: '2024-05-01T12:30:00+02:00',
      metadata: null,
    };
    const decoded = decodeDocument(JSON.stringify(record));

    expect('metadata' in decoded).toBe(false);
    expect(decoded.createdAt.toISOString()).toBe('2024-05-01T10:30:00.000Z');
  });

  it('rejects malformed JSON', () => {
    expect(() => decodeDocument('{not json')).toThrow(SyntaxError);
  });

  it('rejects records that do not match the schema', () => {
    expect(() => decodeDocument(JSON.stringify({ id: 'x' }))).toThrow(/^Invalid document record: /);
    expect(() =>
      decodeDocument(JSON.stringify({ id: 'x', text: 't', embedding: ['1'], createdAt: '2024-05-01T00:00:00Z' }))
    ).toThrow(/embedding\.0/);
  });
});
