import type { ScalarMetadata } from '../common/index.js';
import type { TokenSpan } from '../chunker/index.js';

export interface KnowledgeDocument {
  id: string;
  sourceUri: string;
  mimeType: string;
  contentHash: string;
  version: number;
  title?: string;
  metadata: ScalarMetadata;
  chunkCount: number;
  ingestedAt: Date;
}

export interface IndexEntry {
  chunkId: string;
  documentId: string;
  sequenceIndex: number;
  text: string;
  tokenSpan: TokenSpan;
  metadata: ScalarMetadata;
  vector: number[];
  modelId: string;
}

export interface SearchHit {
  chunkId: string;
  score: number;
}

export interface VectorSearchOptions {
  modelId: string;
}

export interface ReplaceEntriesOptions {
  /** Older document ids whose entries are dropped in the same step. */
  supersededDocumentIds?: readonly string[];
}

export type IngestionStatus = 'accepted' | 'rejected';

export interface IngestionResult {
  documentId: string;
  sourceUri: string;
  status: IngestionStatus;
  reason?: string;
  code?: string;
  retryable?: boolean;
  version?: number;
  chunkCount?: number;
  unchanged?: boolean;
}
