import { z } from 'zod';
import { documentUploadSchema } from '../../documents/index.js';

export const ingestDocumentSchema = documentUploadSchema;

export type IngestDocumentDto = z.infer<typeof ingestDocumentSchema>;

export const searchKnowledgeSchema = z.object({
  query: z
    .string()
    .trim()
    .min(1, 'query is required')
    .max(2000, 'query is too long'),
  topK: z.number().int().positive().max(50).optional(),
});

export type SearchKnowledgeDto = z.infer<typeof searchKnowledgeSchema>;
