import type { ScalarMetadata } from '../common/index.js';

export interface RawDocument {
  sourceUri: string;
  mimeType: string;
  bytes: Uint8Array;
}

/**
 * A run of text in reading order. `page` and `section` mark the structural
 * boundaries the chunker may split on.
 */
export interface ParsedSegment {
  text: string;
  page?: number;
  section?: string;
  extra?: ScalarMetadata;
}

export interface ParsedBlock {
  text: string;
  metadata: ScalarMetadata & { blockIndex: number };
}

export interface FormatParser {
  readonly name: string;
  readonly mimeTypes: readonly string[];
  parse(bytes: Uint8Array): Promise<ParsedSegment[]>;
}

export const FORMAT_PARSERS_TOKEN = Symbol('FORMAT_PARSERS');
