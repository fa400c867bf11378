export * from './app.error.js';
export * from './progress.js';
export * from './write-lock.js';
export * from './app-error.filter.js';
