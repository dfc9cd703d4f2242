import { describe, expect, it } from '@jest/globals';

import type { ConversationTurn } from './chat.types.js';
import { InMemoryConversationTurnRepository } from './conversation-turn.repository.js';

const turn = (id: string): ConversationTurn => ({
  id,
  query: `question ${id}`,
  retrievedChunkIds: ['e1'],
  promptText: 'prompt',
  answerText: 'answer',
  modelId: 'fake-chat',
  latencyMs: 5,
  createdAt: new Date('2024-01-01T00:00:00Z'),
  finishReason: 'stop',
  status: 'succeeded',
});

describe('InMemoryConversationTurnRepository', () => {
  it('lists the newest turns first', async () => {
    const repository = new InMemoryConversationTurnRepository();
    await repository.append(turn('t1'));
    await repository.append(turn('t2'));
    await repository.append(turn('t3'));

    const recent = await repository.listRecent(2);

    expect(recent.map((item) => item.id)).toEqual(['t3', 't2']);
  });

  it('drops the oldest turns beyond its capacity', async () => {
    const repository = new InMemoryConversationTurnRepository(2);
    await repository.append(turn('t1'));
    await repository.append(turn('t2'));
    await repository.append(turn('t3'));

    const recent = await repository.listRecent(10);

    expect(recent.map((item) => item.id)).toEqual(['t3', 't2']);
  });
});
