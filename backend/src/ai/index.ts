export * from './ai.module.js';
export * from './ai.service.js';
export * from './ai.types.js';
export * from './ai.constants.js';
export type { AiProvider } from './providers/ai-provider.js';
