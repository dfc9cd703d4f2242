export * from './knowledge.module.js';
export * from './knowledge.service.js';
export * from './knowledge.types.js';
export * from './index-store.js';
export * from './document.repository.js';
export * from './in-memory-index.store.js';
export * from './knowledge-transaction.js';
