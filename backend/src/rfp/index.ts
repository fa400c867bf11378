export * from './answer-orchestrator.service.js';
export * from './question-detector.js';
export * from './response-assembler.js';
export * from './response-writer.js';
export * from './rfp-prompts.js';
export * from './rfp-session.service.js';
export * from './rfp.errors.js';
export * from './rfp.module.js';
export * from './rfp.service.js';
export * from './rfp.types.js';
