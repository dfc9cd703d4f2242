import { describe, expect, it } from '@jest/globals';

import { encodeSseEvent, sourcesEvent } from './chat-sse.js';

describe('chat SSE events', () => {
  it('reports degraded search sources alongside the cited passages', () => {
    const event = sourcesEvent({
      sources: [
        { chunkId: 'e1', documentId: 'doc-1', order: 1, score: 1, source: 'semantic' },
      ],
      degraded: [{ source: 'lexical', reason: 'fts down' }],
    });

    expect(encodeSseEvent(event)).toBe(
      'data: {"type":"sources","data":[{"chunkId":"e1","documentId":"doc-1","order":1,"score":1,"source":"semantic"}],"degraded":[{"source":"lexical","reason":"fts down"}]}\n\n',
    );
  });

  it('sends an empty degraded list when both sources answered', () => {
    expect(encodeSseEvent(sourcesEvent({ sources: [], degraded: [] }))).toBe(
      'data: {"type":"sources","data":[],"degraded":[]}\n\n',
    );
  });
});
