import { z } from 'zod';
import type { KnowledgeEntry } from './knowledge.types.js';

const knowledgeChunkSchema = z.object({
  id: z.string().min(1),
  entryId: z.string().min(1),
  index: z.number().int().nonnegative(),
  text: z.string().min(1),
  embedding: z.array(z.number()),
  startPosition: z.number().int().nonnegative().optional(),
  endPosition: z.number().int().nonnegative().optional(),
});

const knowledgeEntrySchema = z.object({
  id: z.string().min(1),
  fileName: z.string(),
  originalText: z.string(),
  originalTextEmbedding: z.array(z.number()),
  chunks: z.array(knowledgeChunkSchema),
  createdAt: z.coerce.date(),
  fileSizeBytes: z.number().int().nonnegative(),
});

export const knowledgeCollectionSchema = z.array(knowledgeEntrySchema);

export function serializeEntries(entries: readonly KnowledgeEntry[]): Buffer {
  return Buffer.from(JSON.stringify(entries), 'utf8');
}

/**
 * Throws when the payload is not JSON or does not match the stored shape.
 */
export function deserializeEntries(payload: Buffer): KnowledgeEntry[] {
  const parsed: unknown = JSON.parse(payload.toString('utf8'));
  return knowledgeCollectionSchema.parse(parsed);
}
