const TOKEN_PATTERN = /\S+/g;

/**
 * Whitespace tokenization shared by the chunker, the prompt budget and the
 * embedding input guard, so that "token" means the same thing everywhere.
 */
export function tokenize(text: string): string[] {
  return text.match(TOKEN_PATTERN) ?? [];
}

export function countTokens(text: string): number {
  return tokenize(text).length;
}

/**
 * Keeps the first `maxTokens` whole words of `text`.
 */
export function truncateToTokens(text: string, maxTokens: number): string {
  if (maxTokens <= 0) {
    return '';
  }
  const tokens = tokenize(text);
  if (tokens.length <= maxTokens) {
    return text.trim();
  }
  return tokens.slice(0, maxTokens).join(' ');
}
