/**
 * On-disk document record: a self-describing JSON object holding the full
 * document. `createdAt` is an ISO-8601 timestamp.
 */

import { z } from 'zod';
import { metadataSchema } from '../search/filter.js';
import type { Document } from '../types/index.js';

export const documentRecordSchema = z.object({
  id: z.string().min(1),
  text: z.string(),
  embedding: z.array(z.number().finite()),
  createdAt: z.string().datetime({ offset: true }),
  metadata: metadataSchema.nullish(),
});

export type DocumentRecord = z.infer<typeof documentRecordSchema>;

export function serializeDocument(doc: Document): DocumentRecord {
  const record: DocumentRecord = {
    id: doc.id,
    text: doc.text,
    embedding: [...doc.embedding],
    createdAt: doc.createdAt.toISOString(),
  };
  if (doc.metadata) {
    record.metadata = { ...doc.metadata };
  }
  return record;
}

export function encodeDocument(doc: Document): string {
  return JSON.stringify(serializeDocument(doc), null, 2);
}

/**
 * Decode one record. Throws on malformed JSON or a record that does not
 * match the schema.
 */
export function decodeDocument(content: string): Document {
  const parsed: unknown = JSON.parse(content);
  const result = documentRecordSchema.safeParse(parsed);

  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid document record: ${details}`);
  }

  const record = result.data;
  return {
    id: record.id,
    text: record.text,
    embedding: record.embedding,
    createdAt: new Date(record.createdAt),
    ...(record.metadata ? { metadata: record.metadata } : {}),
  };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
