import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AiModule } from '../ai/index.js';
import type { AppConfig, IndexConfig } from '../config/index.js';
import { DatabaseModule, DatabaseService } from '../database/index.js';
import { GenerationModule } from '../generation/index.js';
import { KnowledgeModule } from '../knowledge/index.js';
import { PromptModule } from '../prompt/index.js';
import { RetrievalModule } from '../retrieval/index.js';
import { ChatController } from './chat.controller.js';
import { ChatService } from './chat.service.js';
import {
  CONVERSATION_TURN_REPOSITORY_TOKEN,
  InMemoryConversationTurnRepository,
  type ConversationTurnRepository,
} from './conversation-turn.repository.js';
import { PostgresConversationTurnRepository } from './postgres-conversation-turn.repository.js';

@Module({
  imports: [
    AiModule,
    DatabaseModule,
    KnowledgeModule,
    RetrievalModule,
    PromptModule,
    GenerationModule,
  ],
  providers: [
    ChatService,
    {
      provide: CONVERSATION_TURN_REPOSITORY_TOKEN,
      useFactory: (
        configService: ConfigService<AppConfig>,
        database: DatabaseService,
      ): ConversationTurnRepository =>
        configService.get<IndexConfig>('index')?.store === 'postgres'
          ? new PostgresConversationTurnRepository(database)
          : new InMemoryConversationTurnRepository(),
      inject: [ConfigService, DatabaseService],
    },
  ],
  controllers: [ChatController],
  exports: [ChatService],
})
export class ChatModule {}
