export * from './generation.module.js';
export * from './generation.service.js';
export * from './generation-stream.js';
export * from './generation.errors.js';
export * from './generation.types.js';
export * from './classify-error.js';
export * from './backoff.js';
