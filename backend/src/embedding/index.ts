export * from './embedding.module.js';
export * from './embedding.service.js';
export * from './embedding.errors.js';
