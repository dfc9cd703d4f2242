import { toScalarMetadata } from '../common/index.js';
import type { SqlExecutor } from '../database/index.js';
import type { IndexStore } from './index-store.js';
import type {
  IndexEntry,
  ReplaceEntriesOptions,
  SearchHit,
  VectorSearchOptions,
} from './knowledge.types.js';
import { parseVector, toVectorLiteral } from './vector.utils.js';

interface ChunkRow {
  chunk_id: string;
  document_id: string;
  sequence_index: number;
  text: string;
  token_start: number;
  token_end: number;
  metadata: Record<string, unknown> | null;
  embedding: string | number[] | null;
  model_id: string;
}

interface HitRow {
  chunk_id: string;
  score: number | string;
}

const INSERT_CHUNK_SQL = `
  INSERT INTO rag_chunks (
    chunk_id,
    document_id,
    sequence_index,
    text,
    token_start,
    token_end,
    metadata,
    embedding,
    model_id,
    updated_at
  )
  VALUES ($1, $2, $3, $4, $5, $6, $7::jsonb, $8::vector, $9, NOW())
  ON CONFLICT (chunk_id) DO UPDATE
  SET
    document_id = EXCLUDED.document_id,
    sequence_index = EXCLUDED.sequence_index,
    text = EXCLUDED.text,
    token_start = EXCLUDED.token_start,
    token_end = EXCLUDED.token_end,
    metadata = EXCLUDED.metadata,
    embedding = EXCLUDED.embedding,
    model_id = EXCLUDED.model_id,
    updated_at = NOW()
`;

/**
 * pgvector-backed index. Lexical ranking uses the generated `tsv` column with
 * `ts_rank_cd`; vector ranking uses cosine distance (`<=>`).
 */
export class PostgresIndexStore implements IndexStore {
  constructor(private readonly sql: SqlExecutor) {}

  async upsert(entry: IndexEntry): Promise<void> {
    await this.sql.query(INSERT_CHUNK_SQL, this.toParams(entry));
  }

  async upsertMany(entries: readonly IndexEntry[]): Promise<void> {
    if (entries.length === 0) {
      return;
    }
    await this.sql.transaction((sql) => this.insertAll(sql, entries));
  }

  async replaceDocumentEntries(
    documentId: string,
    entries: readonly IndexEntry[],
    options: ReplaceEntriesOptions = {},
  ): Promise<void> {
    const dropped = [documentId, ...(options.supersededDocumentIds ?? [])];
    await this.sql.transaction(async (sql) => {
      await sql.query('DELETE FROM rag_chunks WHERE document_id = ANY($1)', [
        dropped,
      ]);
      await this.insertAll(sql, entries);
    });
  }

  async delete(chunkId: string): Promise<void> {
    await this.sql.query('DELETE FROM rag_chunks WHERE chunk_id = $1', [chunkId]);
  }

  async deleteByDocument(documentId: string): Promise<number> {
    const result = await this.sql.query(
      'DELETE FROM rag_chunks WHERE document_id = $1',
      [documentId],
    );
    return result.rowCount ?? 0;
  }

  async searchLexical(query: string, k: number): Promise<SearchHit[]> {
    const trimmed = query.trim();
    if (trimmed.length === 0 || k <= 0) {
      return [];
    }

    const { rows } = await this.sql.query<HitRow>(
      `
      SELECT chunk_id, ts_rank_cd(tsv, query) AS score
      FROM rag_chunks, plainto_tsquery('simple', $1) AS query
      WHERE tsv @@ query
      ORDER BY score DESC, chunk_id ASC
      LIMIT $2
      `,
      [trimmed, k],
    );

    return rows.map(toHit);
  }

  async searchVector(
    vector: readonly number[],
    k: number,
    options: VectorSearchOptions,
  ): Promise<SearchHit[]> {
    const literal = toVectorLiteral(vector);
    if (!literal || k <= 0) {
      return [];
    }

    const { rows } = await this.sql.query<HitRow>(
      `
      SELECT chunk_id, 1 - (embedding <=> $1::vector) AS score
      FROM rag_chunks
      WHERE model_id = $2
        AND embedding IS NOT NULL
        AND vector_dims(embedding) = $3
      ORDER BY embedding <=> $1::vector ASC, chunk_id ASC
      LIMIT $4
      `,
      [literal, options.modelId, vector.length, k],
    );

    return rows.map(toHit);
  }

  async getEntries(chunkIds: readonly string[]): Promise<IndexEntry[]> {
    if (chunkIds.length === 0) {
      return [];
    }
    const { rows } = await this.sql.query<ChunkRow>(
      'SELECT * FROM rag_chunks WHERE chunk_id = ANY($1)',
      [[...chunkIds]],
    );

    const byId = new Map(rows.map((row) => [row.chunk_id, mapEntry(row)]));
    const ordered: IndexEntry[] = [];
    for (const chunkId of chunkIds) {
      const entry = byId.get(chunkId);
      if (entry) {
        ordered.push(entry);
      }
    }
    return ordered;
  }

  async dimensions(modelId: string): Promise<number | null> {
    const { rows } = await this.sql.query<{ dims: number }>(
      `
      SELECT vector_dims(embedding) AS dims
      FROM rag_chunks
      WHERE model_id = $1 AND embedding IS NOT NULL
      LIMIT 1
      `,
      [modelId],
    );
    return rows[0]?.dims ?? null;
  }

  private async insertAll(
    sql: SqlExecutor,
    entries: readonly IndexEntry[],
  ): Promise<void> {
    for (const entry of entries) {
      await sql.query(INSERT_CHUNK_SQL, this.toParams(entry));
    }
  }

  private toParams(entry: IndexEntry): unknown[] {
    return [
      entry.chunkId,
      entry.documentId,
      entry.sequenceIndex,
      entry.text,
      entry.tokenSpan.start,
      entry.tokenSpan.end,
      JSON.stringify(entry.metadata),
      toVectorLiteral(entry.vector),
      entry.modelId,
    ];
  }
}

function toHit(row: HitRow): SearchHit {
  return {
    chunkId: row.chunk_id,
    score: typeof row.score === 'number' ? row.score : Number.parseFloat(row.score),
  };
}

function mapEntry(row: ChunkRow): IndexEntry {
  return {
    chunkId: row.chunk_id,
    documentId: row.document_id,
    sequenceIndex: row.sequence_index,
    text: row.text,
    tokenSpan: { start: row.token_start, end: row.token_end },
    metadata: toScalarMetadata(row.metadata ?? {}),
    vector: parseVector(row.embedding),
    modelId: row.model_id,
  };
}
