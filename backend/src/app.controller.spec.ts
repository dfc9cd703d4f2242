import { beforeEach, describe, expect, it } from '@jest/globals';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';

import { AI_PROVIDER_TOKEN, AIService } from './ai/index.js';
import { AppController } from './app.controller.js';
import { AppService } from './app.service.js';
import { RagSettingsService } from './config/index.js';
import { FakeAiProvider } from './testing/fake-ai-provider.js';
import { createTestConfigService } from './testing/test-config.js';

describe('AppController', () => {
  let controller: AppController;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [AppController],
      providers: [
        AppService,
        AIService,
        RagSettingsService,
        { provide: AI_PROVIDER_TOKEN, useValue: new FakeAiProvider() },
        { provide: ConfigService, useValue: createTestConfigService() },
      ],
    }).compile();

    controller = module.get<AppController>(AppController);
  });

  it('answers the liveness probe', () => {
    expect(controller.root()).toEqual({ message: 'RAG service is running' });
  });

  it('reports the configured models', () => {
    expect(controller.health()).toMatchObject({
      status: 'ok',
      provider: 'fake',
      chatModel: 'fake-chat',
      embeddingModel: 'fake-embedding',
    });
  });
});
