import type { DegradedSource } from '../retrieval/index.js';
import type {
  ChatSource,
  ChatStreamSession,
  QueryFailure,
} from './chat.types.js';

export const SSE_HEADERS: Record<string, string> = {
  'Content-Type': 'text/event-stream',
  'Cache-Control': 'no-cache, no-transform',
  Connection: 'keep-alive',
};

export type ChatSseEvent =
  | {
      type: 'sources';
      data: ChatSource[];
      degraded: readonly DegradedSource[];
    }
  | { type: 'delta'; data: string }
  | {
      type: 'done';
      data: { turnId: string; finishReason: string | null; attempts: number };
    }
  | { type: 'error'; data: QueryFailure & { requestId: string } };

/** First event of a stream: the cited passages and any search source that failed. */
export function sourcesEvent(
  session: Pick<ChatStreamSession, 'sources' | 'degraded'>,
): ChatSseEvent {
  return { type: 'sources', data: session.sources, degraded: session.degraded };
}

export function encodeSseEvent(event: ChatSseEvent): string {
  return `data: ${JSON.stringify(event)}\n\n`;
}
