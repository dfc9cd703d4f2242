export * from './config.module.js';
export * from './configuration.js';
export * from './env.validation.js';
export * from './rag-settings.js';
export * from './rag-settings.service.js';
