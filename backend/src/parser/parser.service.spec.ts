import { beforeEach, describe, expect, it } from '@jest/globals';
import { Test, TestingModule } from '@nestjs/testing';

import { HtmlParser } from './formats/html.parser.js';
import { ImageOcrParser, type OcrEngine } from './formats/image-ocr.parser.js';
import { MarkdownParser } from './formats/markdown.parser.js';
import { PlainTextParser } from './formats/plain-text.parser.js';
import { CorruptInputError, UnsupportedFormatError } from './parser.errors.js';
import { ParserService } from './parser.service.js';
import { FORMAT_PARSERS_TOKEN } from './parser.types.js';

const encode = (text: string) => new TextEncoder().encode(text);

class StaticOcrEngine implements OcrEngine {
  public calls = 0;

  constructor(private readonly text: string) {}

  async recognize(): Promise<string> {
    await Promise.resolve();
    this.calls += 1;
    return this.text;
  }
}

describe('ParserService', () => {
  let service: ParserService;
  let ocr: StaticOcrEngine;

  beforeEach(async () => {
    ocr = new StaticOcrEngine('Scanned heading\n\nScanned body line.');

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ParserService,
        {
          provide: FORMAT_PARSERS_TOKEN,
          useValue: [
            new PlainTextParser(),
            new MarkdownParser(),
            new HtmlParser(),
            new ImageOcrParser(ocr),
          ],
        },
      ],
    }).compile();

    service = module.get<ParserService>(ParserService);
  });

  it('splits plain text into paragraphs in reading order', async () => {
    const blocks = await service.parse({
      sourceUri: 'notes.txt',
      mimeType: 'text/plain',
      bytes: encode('First paragraph\nstill first.\n\n\nSecond one.\r\n\r\nThird.'),
    });

    expect(blocks).toEqual([
      { text: 'First paragraph\nstill first.', metadata: { blockIndex: 0 } },
      { text: 'Second one.', metadata: { blockIndex: 1 } },
      { text: 'Third.', metadata: { blockIndex: 2 } },
    ]);
  });

  it('ignores mime type parameters and case', async () => {
    const blocks = await service.parse({
      sourceUri: 'notes.txt',
      mimeType: 'Text/Plain; charset=utf-8',
      bytes: encode('hello'),
    });

    expect(blocks).toEqual([{ text: 'hello', metadata: { blockIndex: 0 } }]);
  });

  it('tracks markdown sections and keeps fenced code whole', async () => {
    const markdown = [
      '# Intro',
      'Welcome text.',
      '',
      '## Setup',
      '```',
      'npm run build',
      '',
      'npm test',
      '```',
      'After code.',
    ].join('\n');

    const blocks = await service.parse({
      sourceUri: 'guide.md',
      mimeType: 'text/markdown',
      bytes: encode(markdown),
    });

    expect(blocks).toEqual([
      { text: 'Intro', metadata: { section: 'Intro', blockIndex: 0 } },
      { text: 'Welcome text.', metadata: { section: 'Intro', blockIndex: 1 } },
      { text: 'Setup', metadata: { section: 'Setup', blockIndex: 2 } },
      {
        text: '```\nnpm run build\n\nnpm test\n```',
        metadata: { section: 'Setup', blockIndex: 3 },
      },
      { text: 'After code.', metadata: { section: 'Setup', blockIndex: 4 } },
    ]);
  });

  it('extracts html block elements and drops scripts', async () => {
    const html = `<html><head><title>T</title></head><body>
      <h1>Title</h1>
      <script>var x = 1;</script>
      <p>First   para.</p>
      <ul><li><p>Nested item</p></li></ul>
      <h2>Next</h2>
      <p>Second para.</p>
    </body></html>`;

    const blocks = await service.parse({
      sourceUri: 'page.html',
      mimeType: 'text/html',
      bytes: encode(html),
    });

    expect(blocks.map((block) => [block.text, block.metadata.section])).toEqual([
      ['Title', 'Title'],
      ['First para.', 'Title'],
      ['Nested item', 'Title'],
      ['Next', 'Next'],
      ['Second para.', 'Next'],
    ]);
  });

  it('runs images through the injected ocr engine', async () => {
    const blocks = await service.parse({
      sourceUri: 'scan.png',
      mimeType: 'image/png',
      bytes: new Uint8Array([0x89, 0x50, 0x4e, 0x47]),
    });

    expect(ocr.calls).toBe(1);
    expect(blocks).toEqual([
      {
        text: 'Scanned heading',
        metadata: { ocr: true, page: 1, blockIndex: 0 },
      },
      {
        text: 'Scanned body line.',
        metadata: { ocr: true, page: 1, blockIndex: 1 },
      },
    ]);
  });

  it('rejects unknown formats', async () => {
    await expect(
      service.parse({
        sourceUri: 'archive.zip',
        mimeType: 'application/zip',
        bytes: encode('PK'),
      }),
    ).rejects.toBeInstanceOf(UnsupportedFormatError);
  });

  it('rejects empty input and undecodable text', async () => {
    await expect(
      service.parse({
        sourceUri: 'empty.txt',
        mimeType: 'text/plain',
        bytes: new Uint8Array(),
      }),
    ).rejects.toBeInstanceOf(CorruptInputError);

    await expect(
      service.parse({
        sourceUri: 'binary.txt',
        mimeType: 'text/plain',
        bytes: new Uint8Array([0xff, 0xfe, 0xfd]),
      }),
    ).rejects.toMatchObject({ code: 'PARSER_CORRUPT_INPUT', kind: 'input' });
  });

  it('rejects documents without any text', async () => {
    await expect(
      service.parse({
        sourceUri: 'blank.txt',
        mimeType: 'text/plain',
        bytes: encode('   \n\n  '),
      }),
    ).rejects.toBeInstanceOf(CorruptInputError);
  });

  it('lists the registered mime types', () => {
    expect(service.supports('text/markdown')).toBe(true);
    expect(service.supports('application/pdf')).toBe(false);
  });
});
