import { z } from 'zod';
import {
  documentUploadFields,
  hasSingleSource,
  singleSourceMessage,
} from '../../documents/index.js';

export const processRfpSchema = documentUploadFields
  .extend({
    projectName: z.string().trim().min(1).max(200).optional(),
    topK: z.number().int().positive().max(50).optional(),
  })
  .refine(hasSingleSource, singleSourceMessage);

export type ProcessRfpDto = z.infer<typeof processRfpSchema>;

export const detectQuestionsSchema = z.object({
  text: z.string().min(1, 'text is required'),
});

export const updateAnswerSchema = z.object({
  answer: z.string(),
});

export const regenerateAnswerSchema = z
  .object({
    topK: z.number().int().positive().max(50).optional(),
  })
  .default({});

export const questionIndexSchema = z.coerce
  .number()
  .int('question index must be an integer')
  .positive('question index must be positive');
