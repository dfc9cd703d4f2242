import { Logger } from '@nestjs/common';
import { createOpenAI } from '@ai-sdk/openai';
import {
  embedMany,
  generateText as aiGenerateText,
  streamText as aiStreamText,
  type LanguageModelUsage,
} from 'ai';
import type { AiConfig } from '../../config/index.js';
import type {
  AiStreamPart,
  EmbedTextOptions,
  EmbedTextResult,
  GenerateTextOptions,
  GenerateTextResult,
  TokenUsage,
} from '../ai.types.js';
import type { AiProvider } from './ai-provider.js';

type GenerateTextParams = Parameters<typeof aiGenerateText>[0];
type StreamTextParams = Parameters<typeof aiStreamText>[0];
type EmbedManyParams = Parameters<typeof embedMany>[0];

export class OpenAiProvider implements AiProvider {
  public readonly name = 'openai';

  private readonly logger = new Logger(OpenAiProvider.name);
  private readonly client: ReturnType<typeof createOpenAI>;

  constructor(private readonly config: AiConfig['openai']) {
    this.client = this.createClient();
    this.logger.log(
      `OpenAI provider initialized with chat model: ${this.chatModel}, embedding model: ${this.embeddingModel}`,
    );
  }

  get chatModel(): string {
    return this.config.chatModel;
  }

  get embeddingModel(): string {
    return this.config.embeddingModel;
  }

  async generateText(
    options: GenerateTextOptions,
  ): Promise<GenerateTextResult> {
    const modelName = options.model ?? this.chatModel;
    try {
      // retries are owned by GenerationService
      const generateOptions: GenerateTextParams = {
        model: this.client(modelName),
        messages: options.messages,
        temperature: options.temperature ?? 0.2,
        maxRetries: 0,
        abortSignal: options.abortSignal,
      };

      if (options.maxTokens !== undefined) {
        generateOptions.maxOutputTokens = options.maxTokens;
      }

      const result = await aiGenerateText(generateOptions);

      return {
        content: result.text,
        finishReason: result.finishReason ?? null,
        usage: toTokenUsage(result.totalUsage),
        model: modelName,
      };
    } catch (error) {
      this.logger.error(
        'OpenAI text generation failed',
        error instanceof Error ? error.stack : error,
      );
      throw error;
    }
  }

  async *streamText(options: GenerateTextOptions): AsyncIterable<AiStreamPart> {
    const modelName = options.model ?? this.chatModel;
    try {
      const streamOptions: StreamTextParams = {
        model: this.client(modelName),
        messages: options.messages,
        temperature: options.temperature ?? 0.2,
        maxRetries: 0,
        abortSignal: options.abortSignal,
      };

      if (options.maxTokens !== undefined) {
        streamOptions.maxOutputTokens = options.maxTokens;
      }

      const result = aiStreamText(streamOptions);

      for await (const part of result.fullStream) {
        switch (part.type) {
          case 'text-delta':
            yield { type: 'text-delta', text: part.text };
            break;
          case 'finish':
            yield {
              type: 'finish',
              finishReason: part.finishReason ?? null,
              usage: toTokenUsage(part.totalUsage),
            };
            break;
          case 'error':
            throw part.error;
          default:
            break;
        }
      }
    } catch (error) {
      this.logger.error(
        'OpenAI streaming failed',
        error instanceof Error ? error.stack : error,
      );
      throw error;
    }
  }

  async embedText(options: EmbedTextOptions): Promise<EmbedTextResult> {
    const modelName = options.model ?? this.embeddingModel;
    try {
      const embeddingOptions: EmbedManyParams = {
        model: this.client.embedding(modelName),
        values: options.inputs,
        maxRetries: 0,
        abortSignal: options.abortSignal,
      };

      if (this.config.embeddingDimensions !== undefined) {
        embeddingOptions.providerOptions = {
          openai: { dimensions: this.config.embeddingDimensions },
        };
      }

      const result = await embedMany(embeddingOptions);

      return {
        embeddings: result.embeddings.map((embedding) => Array.from(embedding)),
        model: modelName,
      };
    } catch (error) {
      this.logger.error(
        'OpenAI embedding failed',
        error instanceof Error ? error.stack : error,
      );
      throw error;
    }
  }

  private createClient() {
    if (!this.config.apiKey) {
      throw new Error('OpenAI API key is not configured');
    }

    return createOpenAI({
      apiKey: this.config.apiKey,
      baseURL: this.config.baseUrl,
    });
  }
}

function toTokenUsage(usage: LanguageModelUsage | undefined): TokenUsage {
  return {
    inputTokens: usage?.inputTokens,
    outputTokens: usage?.outputTokens,
    totalTokens: usage?.totalTokens,
  };
}
