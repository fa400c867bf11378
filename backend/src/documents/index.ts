export * from './documents.errors.js';
export * from './documents.module.js';
export * from './text-extractor.js';
export * from './dto/document-upload.dto.js';
