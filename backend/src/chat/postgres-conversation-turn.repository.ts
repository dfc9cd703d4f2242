import { Injectable } from '@nestjs/common';
import { DatabaseService } from '../database/index.js';
import type { ConversationTurn, ConversationTurnStatus } from './chat.types.js';
import type { ConversationTurnRepository } from './conversation-turn.repository.js';

interface TurnRow {
  id: string;
  query: string;
  retrieved_chunk_ids: string[] | null;
  prompt_text: string;
  answer_text: string;
  model_id: string;
  latency_ms: number;
  created_at: string | Date;
  finish_reason: string | null;
  status: ConversationTurnStatus;
  error_code: string | null;
}

@Injectable()
export class PostgresConversationTurnRepository
  implements ConversationTurnRepository
{
  constructor(private readonly database: DatabaseService) {}

  async append(turn: ConversationTurn): Promise<void> {
    await this.database.query(
      `INSERT INTO rag_conversation_turns (
        id,
        query,
        retrieved_chunk_ids,
        prompt_text,
        answer_text,
        model_id,
        latency_ms,
        created_at,
        finish_reason,
        status,
        error_code
      )
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)`,
      [
        turn.id,
        turn.query,
        turn.retrievedChunkIds,
        turn.promptText,
        turn.answerText,
        turn.modelId,
        Math.round(turn.latencyMs),
        turn.createdAt,
        turn.finishReason,
        turn.status,
        turn.errorCode ?? null,
      ],
    );
  }

  async listRecent(limit: number): Promise<ConversationTurn[]> {
    const { rows } = await this.database.query<TurnRow>(
      `
      SELECT *
      FROM rag_conversation_turns
      ORDER BY created_at DESC
      LIMIT $1
      `,
      [limit],
    );

    return rows.map((row: TurnRow) => ({
      id: row.id,
      query: row.query,
      retrievedChunkIds: row.retrieved_chunk_ids ?? [],
      promptText: row.prompt_text,
      answerText: row.answer_text,
      modelId: row.model_id,
      latencyMs: row.latency_ms,
      createdAt: new Date(row.created_at),
      finishReason: row.finish_reason,
      status: row.status,
      errorCode: row.error_code ?? undefined,
    }));
  }
}
