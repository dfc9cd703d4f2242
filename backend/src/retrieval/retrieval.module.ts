import { Module } from '@nestjs/common';
import { EmbeddingModule } from '../embedding/index.js';
import { KnowledgeModule } from '../knowledge/index.js';
import { RetrievalService } from './retrieval.service.js';

@Module({
  imports: [KnowledgeModule, EmbeddingModule],
  providers: [RetrievalService],
  exports: [RetrievalService],
})
export class RetrievalModule {}
