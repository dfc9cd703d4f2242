import type { ConversationMessage } from '../prompt/index.js';

export const CONTEXT_QUERY_MAX_LENGTH = 400;

const SHORT_QUESTION_WORDS = 3;

const PREFIX_KEYWORDS = [
  'and',
  'also',
  'then',
  'so',
  'what about',
  'how about',
  'besides',
  'furthermore',
];

const PRONOUN_KEYWORDS = [
  'it',
  'its',
  'this',
  'that',
  'these',
  'those',
  'they',
  'them',
  'above',
];

function words(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}']+/gu) ?? [];
}

export function isFollowUpQuestion(question: string): boolean {
  const tokens = words(question);
  if (tokens.length === 0) {
    return false;
  }
  if (tokens.length <= SHORT_QUESTION_WORDS) {
    return true;
  }

  const joined = tokens.join(' ');
  if (
    PREFIX_KEYWORDS.some(
      (keyword) => joined === keyword || joined.startsWith(`${keyword} `),
    )
  ) {
    return true;
  }

  return tokens.some((token) => PRONOUN_KEYWORDS.includes(token));
}

export function extractLatestUserQuestion(
  history: readonly ConversationMessage[],
): string | undefined {
  for (let index = history.length - 1; index >= 0; index -= 1) {
    const message = history[index];
    if (message.role !== 'user') {
      continue;
    }
    const trimmed = message.content.trim();
    if (trimmed.length === 0) {
      continue;
    }
    return trimmed;
  }
  return undefined;
}

/** Keeps the tail of the query, where the follow-up itself sits. */
export function truncateQuery(input: string, limit: number): string {
  if (input.length <= limit) {
    return input;
  }
  return input.slice(input.length - limit);
}

/**
 * Short or pronoun-led follow-ups ("and the second one?") retrieve poorly on
 * their own, so they are searched together with the previous user question.
 */
export function buildContextAwareQuestion(
  question: string,
  history?: readonly ConversationMessage[],
): string {
  const trimmed = question.trim();
  if (!history?.length || !isFollowUpQuestion(trimmed)) {
    return trimmed;
  }

  const latestUserContext = extractLatestUserQuestion(history);
  if (!latestUserContext) {
    return trimmed;
  }

  const combined = `${latestUserContext} ${trimmed}`.trim();
  if (combined === trimmed) {
    return trimmed;
  }

  return truncateQuery(combined, CONTEXT_QUERY_MAX_LENGTH);
}
