import { Injectable } from '@nestjs/common';
import { AIService } from './ai/index.js';
import { RagSettingsService } from './config/index.js';

export interface HealthStatus {
  status: 'ok';
  provider: string;
  chatModel: string;
  embeddingModel: string;
  settingsRevision: number;
  uptimeSeconds: number;
}

@Injectable()
export class AppService {
  private readonly startedAt = Date.now();

  constructor(
    private readonly aiService: AIService,
    private readonly settings: RagSettingsService,
  ) {}

  getWelcome() {
    return { message: 'RAG service is running' };
  }

  getHealth(): HealthStatus {
    return {
      status: 'ok',
      provider: this.aiService.providerName,
      chatModel: this.aiService.chatModel,
      embeddingModel: this.aiService.embeddingModel,
      settingsRevision: this.settings.version,
      uptimeSeconds: Math.floor((Date.now() - this.startedAt) / 1000),
    };
  }
}
