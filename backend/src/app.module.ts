import { Module } from '@nestjs/common';
import { AiModule } from './ai/index.js';
import { AppController } from './app.controller.js';
import { AppService } from './app.service.js';
import { ChatModule } from './chat/index.js';
import { AppConfigModule } from './config/index.js';
import { KnowledgeModule } from './knowledge/index.js';

@Module({
  imports: [AppConfigModule, AiModule, KnowledgeModule, ChatModule],
  controllers: [AppController],
  providers: [AppService],
})
export class AppModule {}
