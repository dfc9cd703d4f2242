import { RagError } from '../common/index.js';

export class InvalidChunkingConfigError extends RagError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CHUNKER_INVALID_CONFIG', 'input', message, { details });
    this.name = 'InvalidChunkingConfigError';
  }
}
