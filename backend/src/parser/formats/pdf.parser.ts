import { getDocument } from 'pdfjs-dist';
import type { FormatParser, ParsedSegment } from '../parser.types.js';
import { splitParagraphs } from './text-decoding.js';

/**
 * Extracts text page by page with pdf.js. Line breaks come from the
 * `hasEOL` flag of each text item; blank lines separate paragraphs.
 */
export class PdfParser implements FormatParser {
  readonly name = 'pdf';
  readonly mimeTypes = ['application/pdf'] as const;

  async parse(bytes: Uint8Array): Promise<ParsedSegment[]> {
    // pdf.js may transfer the buffer it is given, so hand it a copy
    const loadingTask = getDocument({
      data: new Uint8Array(bytes),
      isEvalSupported: false,
      useSystemFonts: true,
    });
    const pdf = await loadingTask.promise;

    try {
      const segments: ParsedSegment[] = [];
      for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber += 1) {
        const page = await pdf.getPage(pageNumber);
        const content = await page.getTextContent();

        let pageText = '';
        for (const item of content.items) {
          if (!('str' in item)) {
            continue;
          }
          pageText += item.str;
          pageText += item.hasEOL ? '\n' : ' ';
        }
        page.cleanup();

        for (const text of splitParagraphs(pageText)) {
          segments.push({ text, page: pageNumber });
        }
      }
      return segments;
    } finally {
      await pdf.destroy();
    }
  }
}
