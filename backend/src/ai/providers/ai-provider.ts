import type {
  AiStreamPart,
  EmbedTextOptions,
  EmbedTextResult,
  GenerateTextOptions,
  GenerateTextResult,
} from '../ai.types.js';

/**
 * Capability set a generative/embedding backend has to offer. Providers do
 * not retry on their own; retry policy belongs to the generation layer.
 */
export interface AiProvider {
  readonly name: string;
  readonly chatModel: string;
  readonly embeddingModel: string;
  generateText(options: GenerateTextOptions): Promise<GenerateTextResult>;
  streamText(options: GenerateTextOptions): AsyncIterable<AiStreamPart>;
  embedText(options: EmbedTextOptions): Promise<EmbedTextResult>;
}
