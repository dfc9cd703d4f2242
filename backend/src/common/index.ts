export * from './rag.errors.js';
export * from './async.js';
export * from './tokens.js';
export * from './metadata.js';
export * from './http-status.js';
