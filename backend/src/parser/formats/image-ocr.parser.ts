import { createWorker } from 'tesseract.js';
import type { FormatParser, ParsedSegment } from '../parser.types.js';
import { splitParagraphs } from './text-decoding.js';

export interface OcrEngine {
  recognize(image: Uint8Array): Promise<string>;
}

/**
 * One tesseract worker per recognition; the worker is always terminated,
 * including when recognition throws.
 */
export class TesseractOcrEngine implements OcrEngine {
  constructor(private readonly lang: string) {}

  async recognize(image: Uint8Array): Promise<string> {
    const worker = await createWorker(this.lang);
    try {
      const result = await worker.recognize(Buffer.from(image));
      return result.data.text;
    } finally {
      await worker.terminate();
    }
  }
}

export class ImageOcrParser implements FormatParser {
  readonly name = 'image-ocr';
  readonly mimeTypes = [
    'image/png',
    'image/jpeg',
    'image/webp',
    'image/tiff',
    'image/bmp',
    'image/gif',
  ] as const;

  constructor(private readonly engine: OcrEngine) {}

  async parse(bytes: Uint8Array): Promise<ParsedSegment[]> {
    const text = await this.engine.recognize(bytes);
    return splitParagraphs(text.replace(/\r\n?/g, '\n')).map((paragraph) => ({
      text: paragraph,
      page: 1,
      extra: { ocr: true },
    }));
  }
}
