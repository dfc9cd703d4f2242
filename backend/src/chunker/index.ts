export * from './chunker.module.js';
export * from './chunker.service.js';
export * from './chunker.errors.js';
export * from './chunker.types.js';
export * from './chunk-id.js';
