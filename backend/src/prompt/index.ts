export * from './prompt.module.js';
export * from './prompt.service.js';
export * from './prompt.errors.js';
export * from './prompt.types.js';
export * from './prompt-template.js';
