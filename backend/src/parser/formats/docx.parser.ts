import mammoth from 'mammoth';
import type { FormatParser, ParsedSegment } from '../parser.types.js';
import { splitParagraphs } from './text-decoding.js';

export class DocxParser implements FormatParser {
  readonly name = 'docx';
  readonly mimeTypes = [
    'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  ] as const;

  async parse(bytes: Uint8Array): Promise<ParsedSegment[]> {
    const result = await mammoth.extractRawText({ buffer: Buffer.from(bytes) });
    return splitParagraphs(result.value.replace(/\r\n?/g, '\n')).map(
      (text) => ({ text }),
    );
  }
}
