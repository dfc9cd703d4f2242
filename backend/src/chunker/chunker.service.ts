import { Injectable } from '@nestjs/common';
import { tokenize, type ScalarMetadata } from '../common/index.js';
import type { ParsedBlock } from '../parser/index.js';
import { chunkIdFor } from './chunk-id.js';
import { InvalidChunkingConfigError } from './chunker.errors.js';
import type { BoundaryPolicy, Chunk, ChunkingConfig } from './chunker.types.js';

const SENTENCE_END = /[.!?。！？][)"'\]’”»]*$/;

interface TokenSlot {
  token: string;
  page?: number;
  section?: string;
  endsBlock: boolean;
}

export function resolveMinTokens(config: ChunkingConfig): number {
  const fallback = Math.max(
    config.overlapTokens + 1,
    Math.floor(config.maxTokens / 4),
  );
  return Math.min(config.minTokens ?? fallback, config.maxTokens);
}

export function validateChunkingConfig(config: ChunkingConfig): void {
  const { maxTokens, overlapTokens, minTokens } = config;

  if (!Number.isInteger(maxTokens) || maxTokens < 1) {
    throw new InvalidChunkingConfigError('maxTokens must be a positive integer', {
      maxTokens,
    });
  }
  if (!Number.isInteger(overlapTokens) || overlapTokens < 0) {
    throw new InvalidChunkingConfigError(
      'overlapTokens must be a non-negative integer',
      { overlapTokens },
    );
  }
  if (overlapTokens >= maxTokens) {
    throw new InvalidChunkingConfigError(
      'overlapTokens must be smaller than maxTokens',
      { maxTokens, overlapTokens },
    );
  }
  if (
    minTokens !== undefined &&
    (!Number.isInteger(minTokens) || minTokens < 1 || minTokens > maxTokens)
  ) {
    throw new InvalidChunkingConfigError(
      'minTokens must be an integer between 1 and maxTokens',
      { maxTokens, minTokens },
    );
  }
}

function flattenBlocks(blocks: readonly ParsedBlock[]): TokenSlot[] {
  const slots: TokenSlot[] = [];
  for (const block of blocks) {
    const tokens = tokenize(block.text);
    const page =
      typeof block.metadata.page === 'number' ? block.metadata.page : undefined;
    const section =
      typeof block.metadata.section === 'string'
        ? block.metadata.section
        : undefined;

    tokens.forEach((token, index) => {
      slots.push({
        token,
        page,
        section,
        endsBlock: index === tokens.length - 1,
      });
    });
  }
  return slots;
}

function isBoundary(slot: TokenSlot, policy: BoundaryPolicy): boolean {
  switch (policy) {
    case 'paragraph':
      return slot.endsBlock;
    case 'sentence':
      return slot.endsBlock || SENTENCE_END.test(slot.token);
    case 'fixed':
      return false;
  }
}

function metadataFor(slots: readonly TokenSlot[]): ScalarMetadata {
  const first = slots[0];
  const last = slots[slots.length - 1];
  const metadata: ScalarMetadata = {};

  if (first?.page !== undefined) {
    metadata.page = first.page;
    if (last?.page !== undefined && last.page !== first.page) {
      metadata.pageEnd = last.page;
    }
  }
  if (first?.section !== undefined) {
    metadata.section = first.section;
  }
  return metadata;
}

/**
 * Splits parsed blocks into overlapping token windows.
 *
 * A chunk closes when it reaches `maxTokens`, or at the first boundary of the
 * configured policy once it holds `minTokens` tokens that the previous chunk
 * did not cover. The next chunk re-reads the last `overlapTokens` tokens of
 * the previous one, but always starts at least one token further along.
 */
@Injectable()
export class ChunkerService {
  chunk(
    documentId: string,
    blocks: readonly ParsedBlock[],
    config: ChunkingConfig,
  ): Chunk[] {
    validateChunkingConfig(config);

    const slots = flattenBlocks(blocks);
    const minTokens = resolveMinTokens(config);
    const chunks: Chunk[] = [];

    let start = 0;
    let covered = 0;
    while (start < slots.length) {
      let end = start;
      while (end < slots.length) {
        const slot = slots[end];
        end += 1;
        if (end - start >= config.maxTokens) {
          break;
        }
        // overlap re-read from the previous chunk does not count
        if (
          slot &&
          end - Math.max(start, covered) >= minTokens &&
          isBoundary(slot, config.boundaryPolicy)
        ) {
          break;
        }
      }

      const window = slots.slice(start, end);
      const sequenceIndex = chunks.length;
      chunks.push({
        id: chunkIdFor(documentId, sequenceIndex),
        documentId,
        text: window.map((slot) => slot.token).join(' '),
        tokenSpan: { start, end },
        sequenceIndex,
        metadata: metadataFor(window),
      });

      if (end >= slots.length) {
        break;
      }
      covered = end;
      start = end - Math.min(config.overlapTokens, end - start - 1);
    }

    return chunks;
  }
}

/**
 * Joins chunk texts back together, dropping the tokens each chunk shares with
 * the one before it.
 */
export function reconstructText(chunks: readonly Chunk[]): string {
  const tokens: string[] = [];
  let covered = 0;
  for (const chunk of chunks) {
    const chunkTokens = tokenize(chunk.text);
    const skip = covered - chunk.tokenSpan.start;
    tokens.push(...chunkTokens.slice(Math.max(skip, 0)));
    covered = chunk.tokenSpan.end;
  }
  return tokens.join(' ');
}
