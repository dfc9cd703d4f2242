import type { ScalarMetadata } from '../common/index.js';
import type { ChunkingSettings } from '../config/index.js';

export type BoundaryPolicy = ChunkingSettings['boundaryPolicy'];

export type ChunkingConfig = ChunkingSettings;

export interface TokenSpan {
  /** inclusive */
  start: number;
  /** exclusive */
  end: number;
}

export interface Chunk {
  id: string;
  documentId: string;
  text: string;
  tokenSpan: TokenSpan;
  sequenceIndex: number;
  metadata: ScalarMetadata;
}
