import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RagError } from '../common/index.js';
import type { AppConfig } from './configuration.js';
import {
  DEFAULT_RAG_SETTINGS,
  ragSettingsSchema,
  type RagSettings,
  type RagSettingsPatch,
} from './rag-settings.js';

export class SettingsValidationError extends RagError {
  constructor(message: string) {
    super('SETTINGS_INVALID', 'input', message);
    this.name = 'SettingsValidationError';
  }
}

/** A rule owned by another module; returns the problem, or null when satisfied. */
export type SettingsCheck = (settings: Readonly<RagSettings>) => string | null;

/**
 * Holds the runtime pipeline settings as one frozen snapshot.
 *
 * Callers read `current()` once per request and keep that object for the
 * whole request; `reload()` replaces the reference, never the contents.
 */
@Injectable()
export class RagSettingsService {
  private readonly logger = new Logger(RagSettingsService.name);
  private snapshot: Readonly<RagSettings>;
  private revision = 1;
  private readonly checks: SettingsCheck[] = [];

  constructor(configService: ConfigService<AppConfig>) {
    const initial =
      configService.get<RagSettings>('rag') ?? DEFAULT_RAG_SETTINGS;
    this.snapshot = this.validate(initial);
  }

  current(): Readonly<RagSettings> {
    return this.snapshot;
  }

  get version(): number {
    return this.revision;
  }

  /**
   * Adds a rule every later reload must pass. The current snapshot is
   * checked right away.
   */
  addCheck(check: SettingsCheck): void {
    const problem = check(this.snapshot);
    if (problem) {
      throw new SettingsValidationError(`Runtime settings rejected - ${problem}`);
    }
    this.checks.push(check);
  }

  reload(patch: RagSettingsPatch): Readonly<RagSettings> {
    const base = this.snapshot;
    const merged = {
      chunking: { ...base.chunking, ...patch.chunking },
      retrieval: { ...base.retrieval, ...patch.retrieval },
      prompt: { ...base.prompt, ...patch.prompt },
      generation: { ...base.generation, ...patch.generation },
    };

    const next = this.validate(merged);
    for (const check of this.checks) {
      const problem = check(next);
      if (problem) {
        throw new SettingsValidationError(`Runtime settings rejected - ${problem}`);
      }
    }
    this.snapshot = next;
    this.revision += 1;
    this.logger.log(`Runtime settings reloaded (revision ${this.revision})`);
    return next;
  }

  private validate(candidate: unknown): Readonly<RagSettings> {
    const parsed = ragSettingsSchema.safeParse(candidate);
    if (!parsed.success) {
      const messages = parsed.error.errors
        .map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`)
        .join('; ');
      throw new SettingsValidationError(
        `Runtime settings rejected - ${messages}`,
      );
    }
    return deepFreeze(parsed.data);
  }
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (child !== null && typeof child === 'object') {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
