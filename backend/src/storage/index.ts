export * from './in-memory-key-value.store.js';
export * from './key-value-store.js';
export * from './postgres-key-value.store.js';
export * from './storage.module.js';
