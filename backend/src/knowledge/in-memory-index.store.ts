import type { IndexStore } from './index-store.js';
import type {
  IndexEntry,
  ReplaceEntriesOptions,
  SearchHit,
  VectorSearchOptions,
} from './knowledge.types.js';
import {
  BM25_B,
  BM25_K1,
  bm25Idf,
  lexicalTerms,
  termFrequencies,
} from './lexical.js';
import { cosineSimilarity } from './vector.utils.js';

export interface StoredEntry {
  entry: IndexEntry;
  frequencies: Map<string, number>;
  length: number;
}

function byScoreThenId(left: SearchHit, right: SearchHit): number {
  if (right.score !== left.score) {
    return right.score - left.score;
  }
  return left.chunkId < right.chunkId ? -1 : left.chunkId > right.chunkId ? 1 : 0;
}

function freezeEntry(entry: IndexEntry): IndexEntry {
  return Object.freeze({
    ...entry,
    tokenSpan: Object.freeze({ ...entry.tokenSpan }),
    metadata: Object.freeze({ ...entry.metadata }),
    vector: [...entry.vector],
  });
}

/**
 * Process-local index: BM25 over lower-cased letter/digit terms, cosine
 * similarity over vectors. Every mutation happens in one synchronous step,
 * so a concurrent search sees either all of it or none of it.
 */
export class InMemoryIndexStore implements IndexStore {
  private entries = new Map<string, StoredEntry>();

  async upsert(entry: IndexEntry): Promise<void> {
    await this.upsertMany([entry]);
  }

  async upsertMany(entries: readonly IndexEntry[]): Promise<void> {
    await Promise.resolve();
    const next = new Map(this.entries);
    for (const entry of entries) {
      next.set(entry.chunkId, this.prepare(entry));
    }
    this.entries = next;
  }

  async replaceDocumentEntries(
    documentId: string,
    entries: readonly IndexEntry[],
    options: ReplaceEntriesOptions = {},
  ): Promise<void> {
    await Promise.resolve();
    const dropped = new Set([documentId, ...(options.supersededDocumentIds ?? [])]);
    const next = new Map<string, StoredEntry>();
    for (const [chunkId, stored] of this.entries) {
      if (!dropped.has(stored.entry.documentId)) {
        next.set(chunkId, stored);
      }
    }
    for (const entry of entries) {
      next.set(entry.chunkId, this.prepare(entry));
    }
    this.entries = next;
  }

  async delete(chunkId: string): Promise<void> {
    await Promise.resolve();
    this.entries.delete(chunkId);
  }

  async deleteByDocument(documentId: string): Promise<number> {
    await Promise.resolve();
    let removed = 0;
    for (const [chunkId, stored] of this.entries) {
      if (stored.entry.documentId === documentId) {
        this.entries.delete(chunkId);
        removed += 1;
      }
    }
    return removed;
  }

  async searchLexical(query: string, k: number): Promise<SearchHit[]> {
    await Promise.resolve();
    const queryTerms = [...new Set(lexicalTerms(query))];
    if (queryTerms.length === 0 || this.entries.size === 0 || k <= 0) {
      return [];
    }

    const stored = [...this.entries.values()];
    const averageLength =
      stored.reduce((sum, item) => sum + item.length, 0) / stored.length || 1;

    const idf = new Map<string, number>();
    for (const term of queryTerms) {
      const documentFrequency = stored.filter((item) =>
        item.frequencies.has(term),
      ).length;
      idf.set(term, bm25Idf(stored.length, documentFrequency));
    }

    const hits: SearchHit[] = [];
    for (const item of stored) {
      let score = 0;
      for (const term of queryTerms) {
        const frequency = item.frequencies.get(term) ?? 0;
        if (frequency === 0) {
          continue;
        }
        const norm =
          frequency +
          BM25_K1 * (1 - BM25_B + (BM25_B * item.length) / averageLength);
        score += ((idf.get(term) ?? 0) * frequency * (BM25_K1 + 1)) / norm;
      }
      if (score > 0) {
        hits.push({ chunkId: item.entry.chunkId, score });
      }
    }

    return hits.sort(byScoreThenId).slice(0, k);
  }

  async searchVector(
    vector: readonly number[],
    k: number,
    options: VectorSearchOptions,
  ): Promise<SearchHit[]> {
    await Promise.resolve();
    if (vector.length === 0 || k <= 0) {
      return [];
    }

    const hits: SearchHit[] = [];
    for (const { entry } of this.entries.values()) {
      if (entry.modelId !== options.modelId || entry.vector.length !== vector.length) {
        continue;
      }
      hits.push({
        chunkId: entry.chunkId,
        score: cosineSimilarity(vector, entry.vector),
      });
    }

    return hits.sort(byScoreThenId).slice(0, k);
  }

  async getEntries(chunkIds: readonly string[]): Promise<IndexEntry[]> {
    await Promise.resolve();
    const found: IndexEntry[] = [];
    for (const chunkId of chunkIds) {
      const stored = this.entries.get(chunkId);
      if (stored) {
        found.push(stored.entry);
      }
    }
    return found;
  }

  async dimensions(modelId: string): Promise<number | null> {
    await Promise.resolve();
    for (const { entry } of this.entries.values()) {
      if (entry.modelId === modelId) {
        return entry.vector.length;
      }
    }
    return null;
  }

  get size(): number {
    return this.entries.size;
  }

  snapshot(): ReadonlyMap<string, StoredEntry> {
    return new Map(this.entries);
  }

  restore(snapshot: ReadonlyMap<string, StoredEntry>): void {
    this.entries = new Map(snapshot);
  }

  private prepare(entry: IndexEntry): StoredEntry {
    const terms = lexicalTerms(entry.text);
    return {
      entry: freezeEntry(entry),
      frequencies: termFrequencies(terms),
      length: terms.length,
    };
  }
}
