import { RagError } from '../common/index.js';

export class UnsupportedFormatError extends RagError {
  constructor(mimeType: string) {
    super(
      'PARSER_UNSUPPORTED_FORMAT',
      'input',
      `Unsupported document format: ${mimeType || '(empty)'}`,
      { details: { mimeType } },
    );
    this.name = 'UnsupportedFormatError';
  }
}

export class CorruptInputError extends RagError {
  constructor(message: string, options?: { cause?: unknown; mimeType?: string }) {
    super('PARSER_CORRUPT_INPUT', 'input', message, {
      cause: options?.cause,
      details: options?.mimeType ? { mimeType: options.mimeType } : undefined,
    });
    this.name = 'CorruptInputError';
  }
}
