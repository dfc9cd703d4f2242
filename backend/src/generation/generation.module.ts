import { Module } from '@nestjs/common';
import { AiModule } from '../ai/index.js';
import { sleep } from '../common/index.js';
import { GenerationService } from './generation.service.js';
import {
  GENERATION_RUNTIME_TOKEN,
  type GenerationRuntime,
} from './generation.types.js';

export const systemRuntime: GenerationRuntime = {
  now: () => Date.now(),
  random: () => Math.random(),
  sleep,
};

@Module({
  imports: [AiModule],
  providers: [
    GenerationService,
    { provide: GENERATION_RUNTIME_TOKEN, useValue: systemRuntime },
  ],
  exports: [GenerationService],
})
export class GenerationModule {}
