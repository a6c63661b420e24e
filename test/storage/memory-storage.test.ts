import { describe, it, expect } from 'vitest';
import { encodeDocument } from '../../src/storage/codec.js';
import { MemoryStorage } from '../../src/storage/memory-storage.js';
import type { Document } from '../../src/types/index.js';

function makeDoc(id: string): Document {
  return { id, text: `text ${id}`, embedding: [1, 0], createdAt: new Date('2024-01-01T00:00:00.000Z') };
}

describe('MemoryStorage', () => {
  it('saves, loads and deletes records', async () => {
    const storage = new MemoryStorage();
    await storage.save(makeDoc('a'));
    await storage.save(makeDoc('b'));

    expect(storage.size).toBe(2);
    expect(storage.getRecord('a')).toBe(encodeDocument(makeDoc('a')));

    await storage.delete('a');
    await storage.delete('missing');

    const { documents, failures } = await storage.loadAll();
    expect(documents).toEqual([makeDoc('b')]);
    expect(failures).toEqual([]);
  });

  it('reports undecodable records by key', async () => {
    const storage = new MemoryStorage({
      records: { good: encodeDocument(makeDoc('good')), broken: '{' },
    });

    const { documents, failures } = await storage.loadAll();
    expect(documents.map((d) => d.id)).toEqual(['good']);
    expect(failures).toHaveLength(1);
    expect(failures[0].source).toBe('broken');
  });

  it('clears every record', async () => {
    const storage = new MemoryStorage();
    await storage.save(makeDoc('a'));
    await storage.clear();

    expect(storage.size).toBe(0);
    expect(storage.has('a')).toBe(false);
  });
});
