import { CorruptInputError } from '../parser.errors.js';

const utf8 = new TextDecoder('utf-8', { fatal: true });

export function decodeUtf8(bytes: Uint8Array): string {
  try {
    return utf8.decode(bytes).replace(/\r\n?/g, '\n');
  } catch (error) {
    throw new CorruptInputError('Document is not valid UTF-8 text', {
      cause: error,
    });
  }
}

export function splitParagraphs(text: string): string[] {
  return text
    .split(/\n[ \t]*\n/)
    .map((paragraph) => paragraph.trim())
    .filter((paragraph) => paragraph.length > 0);
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}
