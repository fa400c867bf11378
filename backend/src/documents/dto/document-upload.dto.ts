import { z } from 'zod';
import { resolveDocumentKind } from '../text-extractor.js';
import type { DocumentKind } from '../text-extractor.js';

const BASE64_PATTERN = /^[A-Za-z0-9+/\r\n]*={0,2}\s*$/;

export const documentUploadFields = z.object({
  fileName: z.string().trim().min(1, 'fileName is required').max(255),
  /** Base64 encoded file bytes. */
  content: z
    .string()
    .min(1, 'content must not be empty')
    .regex(BASE64_PATTERN, 'content must be base64 encoded')
    .optional(),
  /** Already extracted plain text; skips extraction. */
  text: z.string().min(1, 'text must not be empty').optional(),
});

export const hasSingleSource = (value: {
  content?: string;
  text?: string;
}): boolean => (value.content === undefined) !== (value.text === undefined);

export const singleSourceMessage = {
  message: 'exactly one of content or text is required',
};

export const documentUploadSchema = documentUploadFields.refine(
  hasSingleSource,
  singleSourceMessage,
);

export type DocumentUploadDto = z.infer<typeof documentUploadSchema>;

export interface DocumentUpload {
  fileName: string;
  kind: DocumentKind;
  content: Buffer;
}

export function toDocumentUpload(
  payload: Pick<DocumentUploadDto, 'fileName' | 'content' | 'text'>,
): DocumentUpload {
  if (payload.text !== undefined) {
    return {
      fileName: payload.fileName,
      kind: 'text',
      content: Buffer.from(payload.text, 'utf8'),
    };
  }

  return {
    fileName: payload.fileName,
    kind: resolveDocumentKind(payload.fileName),
    content: Buffer.from(payload.content ?? '', 'base64'),
  };
}
