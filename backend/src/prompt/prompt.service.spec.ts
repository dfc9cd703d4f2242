import { beforeEach, describe, expect, it } from '@jest/globals';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';

import { RagSettingsService } from '../config/index.js';
import type { RetrievedChunk } from '../retrieval/index.js';
import { createTestConfigService } from '../testing/test-config.js';
import { loadPromptTemplates } from './prompt.module.js';
import { createPromptTemplate } from './prompt-template.js';
import { TemplateError } from './prompt.errors.js';
import { PromptService } from './prompt.service.js';
import { PROMPT_TEMPLATES_TOKEN } from './prompt.types.js';

const chunk = (
  chunkId: string,
  documentId: string,
  source: RetrievedChunk['source'],
  text: string,
): RetrievedChunk => ({
  chunkId,
  documentId,
  sequenceIndex: 0,
  text,
  metadata: {},
  score: 1,
  source,
});

describe('PromptService', () => {
  let service: PromptService;
  let settings: RagSettingsService;

  const template = createPromptTemplate(
    'test',
    'Q: {query}\nC: {context}\nH: {history}',
  );
  const results = [
    chunk('a', 'doc-1', 'fused', 'Solar panels convert light.'),
    chunk('b', 'doc-2', 'lexical', 'Wind turbines spin fast.'),
  ];

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        PromptService,
        RagSettingsService,
        {
          provide: PROMPT_TEMPLATES_TOKEN,
          useValue: loadPromptTemplates(undefined),
        },
        { provide: ConfigService, useValue: createTestConfigService() },
      ],
    }).compile();

    service = module.get<PromptService>(PromptService);
    settings = module.get<RagSettingsService>(RagSettingsService);
  });

  it('fills every slot and marks each passage with its provenance', () => {
    const prompt = service.buildPrompt(' what is solar? ', results, template, {
      history: [
        { role: 'user', content: 'hi' },
        { role: 'assistant', content: 'hello' },
      ],
    });

    expect(prompt.text).toBe(
      [
        'Q: what is solar?',
        'C: [chunk:a source:fused doc:doc-1]',
        'Solar panels convert light.',
        '',
        '[chunk:b source:lexical doc:doc-2]',
        'Wind turbines spin fast.',
        'H: User: hi',
        'Assistant: hello',
      ].join('\n'),
    );
    expect(prompt.includedChunkIds).toEqual(['a', 'b']);
    expect(prompt.truncated).toBe(false);
    expect(prompt.contextTokens).toBe(14);
  });

  it('drops passages that do not fit the budget', () => {
    const prompt = service.buildPrompt('solar', results, template, {
      tokenBudget: 10,
    });

    expect(prompt.includedChunkIds).toEqual(['a']);
    expect(prompt.truncated).toBe(true);
    expect(prompt.contextTokens).toBe(7);
  });

  it('cuts the last passage at a word boundary', () => {
    const prompt = service.buildPrompt('solar', results, template, {
      tokenBudget: 12,
    });

    expect(prompt.includedChunkIds).toEqual(['a', 'b']);
    expect(prompt.truncated).toBe(true);
    expect(prompt.contextTokens).toBe(12);
    expect(prompt.text).toContain('[chunk:b source:lexical doc:doc-2]\nWind turbines\nH: (none)');
  });

  it('is deterministic for identical input', () => {
    const first = service.buildPrompt('solar', results, template);
    const second = service.buildPrompt('solar', results, template);

    expect(second).toEqual(first);
  });

  it('does not expand slot names that appear inside values', () => {
    const prompt = service.buildPrompt('explain {context}', [], template);

    expect(prompt.text).toBe(
      'Q: explain {context}\nC: (no context passages were retrieved)\nH: (none)',
    );
    expect(prompt.contextTokens).toBe(0);
  });

  it('uses the configured default template', () => {
    const defaultTemplate = service.getTemplate();

    expect(defaultTemplate.id).toBe('grounded-answer');
    expect(defaultTemplate.requiredSlots).toEqual(['query', 'context']);
    expect(Object.isFrozen(defaultTemplate)).toBe(true);
    expect(() => service.getTemplate('missing')).toThrow(TemplateError);
  });

  it('refuses a settings reload naming an unregistered template', () => {
    const before = settings.current();

    expect(() => settings.reload({ prompt: { templateId: 'nope' } })).toThrow(
      'Runtime settings rejected - prompt.templateId: "nope" is not a registered template (grounded-answer)',
    );
    expect(settings.current()).toBe(before);
    expect(service.getTemplate().id).toBe('grounded-answer');
  });

  it('rejects an empty query', () => {
    expect(() => service.buildPrompt('  ', results, template)).toThrow(TemplateError);
  });
});

describe('createPromptTemplate', () => {
  it('rejects unknown slots', () => {
    expect(() => createPromptTemplate('bad', 'Hello {name}, {query}')).toThrow(
      TemplateError,
    );
  });

  it('rejects templates missing a required slot', () => {
    expect(() =>
      createPromptTemplate('partial', 'Only {query}', ['query', 'context']),
    ).toThrow(TemplateError);
  });

  it('requires every referenced slot by default', () => {
    expect(createPromptTemplate('t', '{context} then {query}').requiredSlots).toEqual([
      'context',
      'query',
    ]);
  });
});
