import { Inject, Injectable } from '@nestjs/common';
import { AI_PROVIDER_TOKEN } from './ai.constants.js';
import type { AiProvider } from './providers/ai-provider.js';
import type {
  AiStreamPart,
  EmbedTextOptions,
  EmbedTextResult,
  GenerateTextOptions,
  GenerateTextResult,
} from './ai.types.js';

@Injectable()
export class AIService {
  constructor(
    @Inject(AI_PROVIDER_TOKEN) private readonly provider: AiProvider,
  ) {}

  get providerName(): string {
    return this.provider.name;
  }

  get chatModel(): string {
    return this.provider.chatModel;
  }

  get embeddingModel(): string {
    return this.provider.embeddingModel;
  }

  generateText(options: GenerateTextOptions): Promise<GenerateTextResult> {
    return this.provider.generateText(options);
  }

  streamText(options: GenerateTextOptions): AsyncIterable<AiStreamPart> {
    return this.provider.streamText(options);
  }

  embedText(options: EmbedTextOptions): Promise<EmbedTextResult> {
    return this.provider.embedText(options);
  }
}
