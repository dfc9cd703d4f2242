import type { ConversationTurn } from './chat.types.js';

/** Append-only audit log of answered (and failed) queries. */
export interface ConversationTurnRepository {
  append(turn: ConversationTurn): Promise<void>;
  listRecent(limit: number): Promise<ConversationTurn[]>;
}

export const CONVERSATION_TURN_REPOSITORY_TOKEN = Symbol(
  'CONVERSATION_TURN_REPOSITORY',
);

export const IN_MEMORY_TURN_CAPACITY = 1000;

/** Keeps the newest `capacity` turns; older ones are dropped. */
export class InMemoryConversationTurnRepository
  implements ConversationTurnRepository
{
  private readonly turns: ConversationTurn[] = [];

  constructor(private readonly capacity = IN_MEMORY_TURN_CAPACITY) {}

  async append(turn: ConversationTurn): Promise<void> {
    await Promise.resolve();
    this.turns.push(
      Object.freeze({
        ...turn,
        retrievedChunkIds: [...turn.retrievedChunkIds],
      }),
    );
    if (this.turns.length > this.capacity) {
      this.turns.splice(0, this.turns.length - this.capacity);
    }
  }

  async listRecent(limit: number): Promise<ConversationTurn[]> {
    await Promise.resolve();
    return this.turns.slice(-limit).reverse();
  }
}
