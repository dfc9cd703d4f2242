import { describe, expect, it } from '@jest/globals';

import { createTestConfigService } from '../testing/test-config.js';
import { validateEnv } from './env.validation.js';
import type { RagSettings } from './rag-settings.js';
import {
  RagSettingsService,
  SettingsValidationError,
} from './rag-settings.service.js';

describe('RagSettingsService', () => {
  const createService = (env: Record<string, string> = {}) =>
    new RagSettingsService(createTestConfigService(env));

  it('starts from the validated environment', () => {
    const service = createService({
      CHUNK_MAX_TOKENS: '128',
      RETRIEVAL_LEXICAL_WEIGHT: '0.3',
    });

    expect(service.version).toBe(1);
    expect(service.current().chunking.maxTokens).toBe(128);
    expect(service.current().retrieval.lexicalWeight).toBe(0.3);
    expect(service.current().prompt.templateId).toBe('grounded-answer');
    expect(Object.isFrozen(service.current().generation)).toBe(true);
  });

  it('swaps in a new snapshot without touching the old one', () => {
    const service = createService();
    const before = service.current();

    const next = service.reload({ retrieval: { defaultTopK: 3 } });

    expect(service.version).toBe(2);
    expect(next.retrieval.defaultTopK).toBe(3);
    expect(next.retrieval.semanticWeight).toBe(0.5);
    expect(before.retrieval.defaultTopK).toBe(6);
    expect(service.current()).toBe(next);
  });

  it('rejects an invalid reload and keeps serving the previous settings', () => {
    const service = createService();
    const before = service.current();

    expect(() => service.reload({ chunking: { overlapTokens: 300 } })).toThrow(
      SettingsValidationError,
    );
    expect(() =>
      service.reload({ retrieval: { semanticWeight: 0, lexicalWeight: 0 } }),
    ).toThrow('at least one fusion weight must be positive');
    expect(service.current()).toBe(before);
    expect(service.version).toBe(1);
  });
});

describe('RagSettingsService checks', () => {
  const knownTemplates = new Set(['grounded-answer']);
  const templateCheck = ({ prompt }: RagSettings) =>
    knownTemplates.has(prompt.templateId) ? null : `unknown template ${prompt.templateId}`;

  it('rejects a reload that fails a registered check as a whole', () => {
    const service = new RagSettingsService(createTestConfigService());
    service.addCheck(templateCheck);
    const before = service.current();

    expect(() =>
      service.reload({ retrieval: { defaultTopK: 3 }, prompt: { templateId: 'nope' } }),
    ).toThrow('Runtime settings rejected - unknown template nope');
    expect(service.current()).toBe(before);
    expect(service.version).toBe(1);
  });

  it('checks the current snapshot when the check is added', () => {
    const service = new RagSettingsService(createTestConfigService());
    service.reload({ prompt: { templateId: 'custom' } });

    expect(() => service.addCheck(templateCheck)).toThrow(SettingsValidationError);
  });
});

describe('validateEnv', () => {
  it('applies defaults', () => {
    const env = validateEnv({ NODE_ENV: 'test' });

    expect(env.PORT).toBe(3000);
    expect(env.INDEX_STORE).toBe('memory');
    expect(env.CHUNK_BOUNDARY_POLICY).toBe('sentence');
    expect(env.GENERATION_MAX_RETRIES).toBe(3);
  });

  it('requires an API key outside of tests', () => {
    expect(() => validateEnv({ NODE_ENV: 'production' })).toThrow(
      'OPENAI_API_KEY: OPENAI_API_KEY is required',
    );
  });

  it('requires a database URL for the postgres store', () => {
    expect(() => validateEnv({ NODE_ENV: 'test', INDEX_STORE: 'postgres' })).toThrow(
      'DATABASE_URL: DATABASE_URL is required when INDEX_STORE=postgres',
    );
  });

  it('rejects an overlap that is not smaller than the chunk size', () => {
    expect(() =>
      validateEnv({
        NODE_ENV: 'test',
        CHUNK_MAX_TOKENS: '16',
        CHUNK_OVERLAP_TOKENS: '16',
      }),
    ).toThrow('CHUNK_OVERLAP_TOKENS must be smaller than CHUNK_MAX_TOKENS');
  });

  it('parses boolean-like SSL flags', () => {
    expect(validateEnv({ NODE_ENV: 'test', DATABASE_SSL: 'yes' }).DATABASE_SSL).toBe(
      true,
    );
    expect(validateEnv({ NODE_ENV: 'test', DATABASE_SSL: 'off' }).DATABASE_SSL).toBe(
      false,
    );
  });
});
