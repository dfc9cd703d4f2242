import type {
  IndexEntry,
  ReplaceEntriesOptions,
  SearchHit,
  VectorSearchOptions,
} from './knowledge.types.js';

/**
 * Storage for chunk text and vectors. Text and vector of one entry are always
 * written together; searches over an empty index or an empty query return
 * no hits.
 */
export interface IndexStore {
  upsert(entry: IndexEntry): Promise<void>;
  upsertMany(entries: readonly IndexEntry[]): Promise<void>;
  replaceDocumentEntries(
    documentId: string,
    entries: readonly IndexEntry[],
    options?: ReplaceEntriesOptions,
  ): Promise<void>;
  delete(chunkId: string): Promise<void>;
  deleteByDocument(documentId: string): Promise<number>;
  searchLexical(query: string, k: number): Promise<SearchHit[]>;
  searchVector(
    vector: readonly number[],
    k: number,
    options: VectorSearchOptions,
  ): Promise<SearchHit[]>;
  getEntries(chunkIds: readonly string[]): Promise<IndexEntry[]>;
  /** Vector size of the entries embedded by `modelId`, or null when there are none. */
  dimensions(modelId: string): Promise<number | null>;
}

export const INDEX_STORE_TOKEN = Symbol('INDEX_STORE');
