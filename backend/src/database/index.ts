export * from './database.module.js';
export * from './database.service.js';
