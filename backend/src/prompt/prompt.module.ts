import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfig, PromptConfig } from '../config/index.js';
import { createPromptTemplate } from './prompt-template.js';
import { PromptService } from './prompt.service.js';
import { PROMPT_TEMPLATES_TOKEN, type PromptTemplate } from './prompt.types.js';
import {
  GROUNDED_ANSWER_TEMPLATE_ID,
  groundedAnswerTemplate,
} from './templates/grounded-answer.js';

export const CUSTOM_TEMPLATE_ID = 'custom';

export function loadPromptTemplates(
  config: PromptConfig | undefined,
): ReadonlyMap<string, PromptTemplate> {
  const templates = new Map<string, PromptTemplate>([
    [GROUNDED_ANSWER_TEMPLATE_ID, groundedAnswerTemplate],
  ]);

  if (config?.templatePath) {
    const path = resolve(process.cwd(), config.templatePath);
    const text = readFileSync(path, 'utf8');
    templates.set(
      CUSTOM_TEMPLATE_ID,
      createPromptTemplate(CUSTOM_TEMPLATE_ID, text, ['query', 'context']),
    );
    new Logger('PromptModule').log(`Loaded custom prompt template from ${path}`);
  }

  return templates;
}

@Module({
  providers: [
    {
      provide: PROMPT_TEMPLATES_TOKEN,
      useFactory: (configService: ConfigService<AppConfig>) =>
        loadPromptTemplates(configService.get<PromptConfig>('prompt')),
      inject: [ConfigService],
    },
    PromptService,
  ],
  exports: [PromptService],
})
export class PromptModule {}
