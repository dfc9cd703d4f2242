import { Inject, Injectable, Logger } from '@nestjs/common';
import { RagError, errorMessage } from '../common/index.js';
import { CorruptInputError, UnsupportedFormatError } from './parser.errors.js';
import {
  FORMAT_PARSERS_TOKEN,
  type FormatParser,
  type ParsedBlock,
  type ParsedSegment,
  type RawDocument,
} from './parser.types.js';

export function normalizeMimeType(mimeType: string): string {
  return (mimeType.split(';')[0] ?? '').trim().toLowerCase();
}

@Injectable()
export class ParserService {
  private readonly logger = new Logger(ParserService.name);
  private readonly parsersByMimeType = new Map<string, FormatParser>();

  constructor(
    @Inject(FORMAT_PARSERS_TOKEN) parsers: readonly FormatParser[],
  ) {
    for (const parser of parsers) {
      for (const mimeType of parser.mimeTypes) {
        this.parsersByMimeType.set(mimeType, parser);
      }
    }
  }

  supportedMimeTypes(): string[] {
    return [...this.parsersByMimeType.keys()].sort();
  }

  supports(mimeType: string): boolean {
    return this.parsersByMimeType.has(normalizeMimeType(mimeType));
  }

  async parse(document: RawDocument): Promise<ParsedBlock[]> {
    const mimeType = normalizeMimeType(document.mimeType);
    const parser = this.parsersByMimeType.get(mimeType);

    if (!parser) {
      throw new UnsupportedFormatError(document.mimeType);
    }

    if (document.bytes.byteLength === 0) {
      throw new CorruptInputError(`Document ${document.sourceUri} is empty`, {
        mimeType,
      });
    }

    let segments: ParsedSegment[];
    try {
      segments = await parser.parse(document.bytes);
    } catch (error) {
      if (error instanceof RagError) {
        throw error;
      }
      this.logger.warn(
        `${parser.name} parser rejected ${document.sourceUri}: ${errorMessage(error)}`,
      );
      throw new CorruptInputError(
        `Unable to parse ${document.sourceUri} as ${mimeType}: ${errorMessage(error)}`,
        { cause: error, mimeType },
      );
    }

    const blocks: ParsedBlock[] = [];
    for (const segment of segments) {
      const text = segment.text.trim();
      if (text.length === 0) {
        continue;
      }
      blocks.push({
        text,
        metadata: {
          ...segment.extra,
          ...(segment.page !== undefined ? { page: segment.page } : {}),
          ...(segment.section !== undefined ? { section: segment.section } : {}),
          blockIndex: blocks.length,
        },
      });
    }

    if (blocks.length === 0) {
      throw new CorruptInputError(
        `No text could be extracted from ${document.sourceUri}`,
        { mimeType },
      );
    }

    this.logger.debug(
      `Parsed ${document.sourceUri} (${mimeType}) into ${blocks.length} blocks`,
    );

    return blocks;
  }
}
