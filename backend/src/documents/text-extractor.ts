import path from 'node:path';
import { UnsupportedFileTypeError } from './documents.errors.js';

export type DocumentKind = 'pdf' | 'docx' | 'text';

export interface TextExtractor {
  /** Returns UTF-8 text with line breaks preserved. */
  extract(content: Buffer, kind: DocumentKind): Promise<string>;
}

export const TEXT_EXTRACTOR_TOKEN = Symbol('TEXT_EXTRACTOR');

const KIND_BY_EXTENSION: Record<string, DocumentKind> = {
  '.pdf': 'pdf',
  '.docx': 'docx',
  '.txt': 'text',
  '.md': 'text',
};

export function resolveDocumentKind(fileName: string): DocumentKind {
  const kind = KIND_BY_EXTENSION[path.extname(fileName).toLowerCase()];
  if (!kind) {
    throw new UnsupportedFileTypeError(fileName);
  }
  return kind;
}

export function isSupportedDocument(fileName: string): boolean {
  return path.extname(fileName).toLowerCase() in KIND_BY_EXTENSION;
}
