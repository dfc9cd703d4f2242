import { JSDOM } from 'jsdom';
import type { FormatParser, ParsedSegment } from '../parser.types.js';
import { collapseWhitespace, decodeUtf8 } from './text-decoding.js';

const BLOCK_SELECTOR = [
  'h1',
  'h2',
  'h3',
  'h4',
  'h5',
  'h6',
  'p',
  'li',
  'pre',
  'blockquote',
  'dt',
  'dd',
  'th',
  'td',
  'figcaption',
  'caption',
].join(',');

const HEADING_TAGS = new Set(['H1', 'H2', 'H3', 'H4', 'H5', 'H6']);

export class HtmlParser implements FormatParser {
  readonly name = 'html';
  readonly mimeTypes = ['text/html', 'application/xhtml+xml'] as const;

  async parse(bytes: Uint8Array): Promise<ParsedSegment[]> {
    await Promise.resolve();
    const dom = new JSDOM(decodeUtf8(bytes));
    try {
      const { document } = dom.window;
      document
        .querySelectorAll('script, style, noscript, template, head')
        .forEach((element) => element.remove());

      const body = document.body;
      if (!body) {
        return [];
      }

      const segments: ParsedSegment[] = [];
      let section: string | undefined;

      for (const element of Array.from(body.querySelectorAll(BLOCK_SELECTOR))) {
        // nested blocks (a <p> inside an <li>) are covered by their outermost match
        if (element.parentElement?.closest(BLOCK_SELECTOR)) {
          continue;
        }

        const text = collapseWhitespace(element.textContent ?? '');
        if (text.length === 0) {
          continue;
        }

        if (HEADING_TAGS.has(element.tagName)) {
          section = text;
        }
        segments.push(section ? { text, section } : { text });
      }

      if (segments.length === 0) {
        const text = collapseWhitespace(body.textContent ?? '');
        return text.length > 0 ? [{ text }] : [];
      }

      return segments;
    } finally {
      dom.window.close();
    }
  }
}
