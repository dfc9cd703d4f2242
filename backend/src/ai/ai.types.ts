export type AiMessageRole = 'system' | 'user' | 'assistant';

export interface AiMessage {
  role: AiMessageRole;
  content: string;
}

export interface TokenUsage {
  inputTokens?: number;
  outputTokens?: number;
  totalTokens?: number;
}

export interface GenerateTextOptions {
  model?: string;
  messages: AiMessage[];
  temperature?: number;
  maxTokens?: number;
  abortSignal?: AbortSignal;
}

export interface GenerateTextResult {
  content: string;
  finishReason: string | null;
  usage?: TokenUsage;
  model: string;
}

export type AiStreamPart =
  | { type: 'text-delta'; text: string }
  | { type: 'finish'; finishReason: string | null; usage?: TokenUsage };

export interface EmbedTextOptions {
  model?: string;
  inputs: string[];
  abortSignal?: AbortSignal;
}

export interface EmbedTextResult {
  embeddings: number[][];
  model: string;
}
