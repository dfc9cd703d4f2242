import { Module } from '@nestjs/common';
import { ChunkerService } from './chunker.service.js';

@Module({
  providers: [ChunkerService],
  exports: [ChunkerService],
})
export class ChunkerModule {}
