import type { TokenUsage } from '../ai/index.js';
import type { GenerationSettings } from '../config/index.js';

export type GenerationState =
  | 'pending'
  | 'in_flight'
  | 'succeeded'
  | 'failed'
  | 'timed_out';

export interface Answer {
  text: string;
  finishReason: string | null;
  usage?: TokenUsage;
  modelId: string;
  attempts: number;
}

export type GenerationEvent =
  | { type: 'delta'; text: string }
  | {
      type: 'done';
      finishReason: string | null;
      usage?: TokenUsage;
      modelId: string;
      attempts: number;
    };

export interface GenerateOptions {
  signal?: AbortSignal;
  /** Snapshot to use instead of the current runtime settings. */
  settings?: GenerationSettings;
}

/** Clock, randomness and waiting, injectable so retries can be tested without real time. */
export interface GenerationRuntime {
  now(): number;
  random(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const GENERATION_RUNTIME_TOKEN = Symbol('GENERATION_RUNTIME');
