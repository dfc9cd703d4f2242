import type { SearchHit } from '../knowledge/index.js';

/**
 * `sequence-index` prefers earlier chunks on equal scores; `chunk-id` orders
 * ties by identifier only.
 */
export type TieBreakPolicy = 'sequence-index' | 'chunk-id';

export interface FusionPolicy {
  semanticWeight: number;
  lexicalWeight: number;
  tieBreak?: TieBreakPolicy;
}

export interface RankKey {
  sequenceIndex: number;
  documentId: string;
}

export interface FusedHit {
  chunkId: string;
  score: number;
  source: 'lexical' | 'semantic' | 'fused';
  lexicalScore?: number;
  semanticScore?: number;
}

const SCORE_EPSILON = 1e-12;

/**
 * Min-max scales scores into [0, 1]. A list whose scores are all equal maps
 * every hit to 1.
 */
export function normalizeScores(hits: readonly SearchHit[]): Map<string, number> {
  const normalized = new Map<string, number>();
  if (hits.length === 0) {
    return normalized;
  }

  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  for (const hit of hits) {
    min = Math.min(min, hit.score);
    max = Math.max(max, hit.score);
  }

  const range = max - min;
  for (const hit of hits) {
    const value = range <= SCORE_EPSILON ? 1 : (hit.score - min) / range;
    // duplicates inside one list keep their best score
    normalized.set(hit.chunkId, Math.max(value, normalized.get(hit.chunkId) ?? 0));
  }
  return normalized;
}

function compareIds(left: string, right: string): number {
  return left < right ? -1 : left > right ? 1 : 0;
}

/**
 * Weighted sum of normalized lexical and semantic scores. When one list is
 * missing (its source failed) the other carries the whole weight. By default
 * ties go to the lower sequence index, then document id, then chunk id.
 */
export function fuseHits(
  lexical: readonly SearchHit[] | null,
  semantic: readonly SearchHit[] | null,
  policy: FusionPolicy,
  keys: ReadonlyMap<string, RankKey>,
  k: number,
): FusedHit[] {
  const lexicalWeight = semantic === null ? 1 : lexical === null ? 0 : policy.lexicalWeight;
  const semanticWeight = lexical === null ? 1 : semantic === null ? 0 : policy.semanticWeight;
  const bySequence = (policy.tieBreak ?? 'sequence-index') === 'sequence-index';

  const lexicalScores = normalizeScores(lexical ?? []);
  const semanticScores = normalizeScores(semantic ?? []);
  const chunkIds = new Set([...lexicalScores.keys(), ...semanticScores.keys()]);

  const fused: FusedHit[] = [];
  for (const chunkId of chunkIds) {
    if (!keys.has(chunkId)) {
      continue;
    }
    const lexicalScore = lexicalScores.get(chunkId);
    const semanticScore = semanticScores.get(chunkId);
    const score =
      lexicalWeight * (lexicalScore ?? 0) + semanticWeight * (semanticScore ?? 0);

    fused.push({
      chunkId,
      score,
      source:
        lexicalScore !== undefined && semanticScore !== undefined
          ? 'fused'
          : lexicalScore !== undefined
            ? 'lexical'
            : 'semantic',
      lexicalScore,
      semanticScore,
    });
  }

  fused.sort((left, right) => {
    if (Math.abs(right.score - left.score) > SCORE_EPSILON) {
      return right.score - left.score;
    }
    const leftKey = keys.get(left.chunkId);
    const rightKey = keys.get(right.chunkId);
    if (bySequence && leftKey && rightKey) {
      if (leftKey.sequenceIndex !== rightKey.sequenceIndex) {
        return leftKey.sequenceIndex - rightKey.sequenceIndex;
      }
      const byDocument = compareIds(leftKey.documentId, rightKey.documentId);
      if (byDocument !== 0) {
        return byDocument;
      }
    }
    return compareIds(left.chunkId, right.chunkId);
  });

  return fused.slice(0, k);
}
