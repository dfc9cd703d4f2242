import type { ScalarMetadata } from '../common/index.js';

export type RetrievalSource = 'lexical' | 'semantic' | 'fused';

export interface RetrievedChunk {
  chunkId: string;
  documentId: string;
  sequenceIndex: number;
  text: string;
  metadata: ScalarMetadata;
  score: number;
  source: RetrievalSource;
  lexicalScore?: number;
  semanticScore?: number;
}

export interface DegradedSource {
  source: 'lexical' | 'semantic';
  reason: string;
}

export interface RetrievalResult {
  query: string;
  results: readonly RetrievedChunk[];
  degraded: readonly DegradedSource[];
}

export interface RetrieveOptions {
  signal?: AbortSignal;
}
