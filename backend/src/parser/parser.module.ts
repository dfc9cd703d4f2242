import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfig, IngestionConfig } from '../config/index.js';
import { DocxParser } from './formats/docx.parser.js';
import { HtmlParser } from './formats/html.parser.js';
import {
  ImageOcrParser,
  TesseractOcrEngine,
} from './formats/image-ocr.parser.js';
import { MarkdownParser } from './formats/markdown.parser.js';
import { PdfParser } from './formats/pdf.parser.js';
import { PlainTextParser } from './formats/plain-text.parser.js';
import { ParserService } from './parser.service.js';
import { FORMAT_PARSERS_TOKEN, type FormatParser } from './parser.types.js';

@Module({
  providers: [
    {
      provide: FORMAT_PARSERS_TOKEN,
      useFactory: (configService: ConfigService<AppConfig>): FormatParser[] => {
        const ingestion = configService.get<IngestionConfig>('ingestion');

        return [
          new PlainTextParser(),
          new MarkdownParser(),
          new HtmlParser(),
          new PdfParser(),
          new DocxParser(),
          new ImageOcrParser(new TesseractOcrEngine(ingestion?.ocrLang ?? 'eng')),
        ];
      },
      inject: [ConfigService],
    },
    ParserService,
  ],
  exports: [ParserService],
})
export class ParserModule {}
