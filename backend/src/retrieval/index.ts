export * from './retrieval.module.js';
export * from './retrieval.service.js';
export * from './retrieval.errors.js';
export * from './retrieval.types.js';
export * from './fusion.js';
