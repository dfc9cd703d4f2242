import type { TokenUsage } from '../ai/index.js';
import type { RagErrorKind } from '../common/index.js';
import type { DegradedSource, RetrievalSource } from '../retrieval/index.js';

export type QueryStage = 'retrieval' | 'prompt' | 'generation';

export interface QueryFailure {
  code: string;
  kind: RagErrorKind;
  retryable: boolean;
  message: string;
  provenance?: {
    stage: QueryStage;
    retrievedChunkIds: string[];
  };
}

export interface ChatSource {
  chunkId: string;
  documentId: string;
  sourceUri?: string;
  title?: string;
  order: number;
  score: number;
  source: RetrievalSource;
}

export interface ChatAnswer {
  turnId: string;
  answer: string;
  sources: ChatSource[];
  degraded: readonly DegradedSource[];
  finishReason: string | null;
  usage?: TokenUsage;
  modelId: string;
  attempts: number;
}

export type ChatStreamChunk =
  | { type: 'delta'; text: string }
  | {
      type: 'done';
      turnId: string;
      finishReason: string | null;
      usage?: TokenUsage;
      attempts: number;
    };

export interface ChatStreamSession {
  sources: ChatSource[];
  degraded: readonly DegradedSource[];
  events: AsyncIterable<ChatStreamChunk>;
}

export type ConversationTurnStatus = 'succeeded' | 'failed';

export interface ConversationTurn {
  id: string;
  query: string;
  retrievedChunkIds: string[];
  promptText: string;
  answerText: string;
  modelId: string;
  latencyMs: number;
  createdAt: Date;
  finishReason: string | null;
  status: ConversationTurnStatus;
  errorCode?: string;
}
