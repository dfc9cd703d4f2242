const TERM_PATTERN = /[\p{L}\p{N}]+/gu;

export function lexicalTerms(text: string): string[] {
  return text.toLowerCase().match(TERM_PATTERN) ?? [];
}

export function termFrequencies(terms: readonly string[]): Map<string, number> {
  const frequencies = new Map<string, number>();
  for (const term of terms) {
    frequencies.set(term, (frequencies.get(term) ?? 0) + 1);
  }
  return frequencies;
}

export const BM25_K1 = 1.2;
export const BM25_B = 0.75;

export function bm25Idf(documentCount: number, documentFrequency: number): number {
  return Math.log(
    1 + (documentCount - documentFrequency + 0.5) / (documentFrequency + 0.5),
  );
}
