export * from './chunker.js';
export * from './knowledge-store.service.js';
export * from './knowledge.errors.js';
export * from './knowledge.module.js';
export * from './knowledge.service.js';
export * from './knowledge.types.js';
export * from './retriever.service.js';
export * from './similarity.js';
