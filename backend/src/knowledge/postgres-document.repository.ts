import { toScalarMetadata } from '../common/index.js';
import type { SqlExecutor } from '../database/index.js';
import type { DocumentRepository } from './document.repository.js';
import type { KnowledgeDocument } from './knowledge.types.js';

interface DocumentRow {
  id: string;
  source_uri: string;
  mime_type: string;
  content_hash: string;
  version: number;
  title: string | null;
  metadata: Record<string, unknown> | null;
  chunk_count: number;
  ingested_at: string | Date;
}

export class PostgresDocumentRepository implements DocumentRepository {
  constructor(private readonly sql: SqlExecutor) {}

  async findById(id: string): Promise<KnowledgeDocument | null> {
    const { rows } = await this.sql.query<DocumentRow>(
      'SELECT * FROM rag_documents WHERE id = $1',
      [id],
    );
    const row = rows[0];
    return row ? this.mapDocument(row) : null;
  }

  async findLatestBySourceUri(
    sourceUri: string,
  ): Promise<KnowledgeDocument | null> {
    const { rows } = await this.sql.query<DocumentRow>(
      `
      SELECT *
      FROM rag_documents
      WHERE source_uri = $1
      ORDER BY version DESC
      LIMIT 1
      `,
      [sourceUri],
    );
    const row = rows[0];
    return row ? this.mapDocument(row) : null;
  }

  async save(document: KnowledgeDocument): Promise<KnowledgeDocument> {
    await this.sql.query(
      `INSERT INTO rag_documents (
        id,
        source_uri,
        mime_type,
        content_hash,
        version,
        title,
        metadata,
        chunk_count,
        ingested_at
      )
      VALUES ($1, $2, $3, $4, $5, $6, $7::jsonb, $8, $9)
      ON CONFLICT (id) DO UPDATE
      SET
        title = EXCLUDED.title,
        metadata = EXCLUDED.metadata,
        chunk_count = EXCLUDED.chunk_count`,
      [
        document.id,
        document.sourceUri,
        document.mimeType,
        document.contentHash,
        document.version,
        document.title ?? null,
        JSON.stringify(document.metadata),
        document.chunkCount,
        document.ingestedAt,
      ],
    );
    return document;
  }

  async list(): Promise<KnowledgeDocument[]> {
    const { rows } = await this.sql.query<DocumentRow>(
      `
      SELECT *
      FROM rag_documents
      ORDER BY ingested_at DESC
      `,
    );

    return rows.map((row: DocumentRow) => this.mapDocument(row));
  }

  async remove(id: string): Promise<boolean> {
    const result = await this.sql.query(
      'DELETE FROM rag_documents WHERE id = $1',
      [id],
    );
    return (result.rowCount ?? 0) > 0;
  }

  private mapDocument(row: DocumentRow): KnowledgeDocument {
    return {
      id: row.id,
      sourceUri: row.source_uri,
      mimeType: row.mime_type,
      contentHash: row.content_hash,
      version: row.version,
      title: row.title ?? undefined,
      metadata: toScalarMetadata(row.metadata ?? {}),
      chunkCount: row.chunk_count,
      ingestedAt: new Date(row.ingested_at),
    };
  }
}
