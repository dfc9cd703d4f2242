import type { FormatParser, ParsedSegment } from '../parser.types.js';
import { decodeUtf8, splitParagraphs } from './text-decoding.js';

export class PlainTextParser implements FormatParser {
  readonly name = 'plain-text';
  readonly mimeTypes = ['text/plain'] as const;

  async parse(bytes: Uint8Array): Promise<ParsedSegment[]> {
    await Promise.resolve();
    return splitParagraphs(decodeUtf8(bytes)).map((text) => ({ text }));
  }
}
