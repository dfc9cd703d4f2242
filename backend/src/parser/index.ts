export * from './parser.module.js';
export * from './parser.service.js';
export * from './parser.errors.js';
export * from './parser.types.js';
export type { OcrEngine } from './formats/image-ocr.parser.js';
