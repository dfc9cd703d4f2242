import type { FormatParser, ParsedSegment } from '../parser.types.js';
import { decodeUtf8 } from './text-decoding.js';

const HEADING_PATTERN = /^#{1,6}\s+(.*?)\s*#*\s*$/;
const FENCE_PATTERN = /^(```|~~~)/;

/**
 * Splits Markdown on blank lines and ATX headings. Each heading opens a new
 * section; fenced code blocks are kept whole.
 */
export class MarkdownParser implements FormatParser {
  readonly name = 'markdown';
  readonly mimeTypes = ['text/markdown', 'text/x-markdown'] as const;

  async parse(bytes: Uint8Array): Promise<ParsedSegment[]> {
    await Promise.resolve();
    const lines = decodeUtf8(bytes).split('\n');
    const segments: ParsedSegment[] = [];
    let section: string | undefined;
    let buffer: string[] = [];
    let inFence = false;

    const flush = () => {
      const text = buffer.join('\n').trim();
      if (text.length > 0) {
        segments.push(section ? { text, section } : { text });
      }
      buffer = [];
    };

    for (const line of lines) {
      const trimmed = line.trim();

      if (FENCE_PATTERN.test(trimmed)) {
        if (!inFence) {
          flush();
        }
        buffer.push(line);
        inFence = !inFence;
        if (!inFence) {
          flush();
        }
        continue;
      }

      if (inFence) {
        buffer.push(line);
        continue;
      }

      const heading = HEADING_PATTERN.exec(trimmed);
      if (heading) {
        flush();
        section = heading[1];
        buffer.push(heading[1]);
        flush();
        continue;
      }

      if (trimmed.length === 0) {
        flush();
        continue;
      }

      buffer.push(line);
    }

    flush();
    return segments;
  }
}
