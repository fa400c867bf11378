export * from './ai.constants.js';
export * from './ai.errors.js';
export * from './ai.module.js';
export * from './ai.service.js';
export * from './ai.types.js';
