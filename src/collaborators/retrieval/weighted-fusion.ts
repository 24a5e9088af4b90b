/**
 * Weighted Reciprocal Rank Fusion.
 * score(chunk) = Σ weight_source / (k + rank_source), k = 60, rank from 1.
 * Sources with zero weight contribute nothing and are skipped entirely, so a
 * chunk seen only by a disabled source never appears in the output.
 */

import type { RetrievalSource } from '../../weights/weights.types';

export const RRF_K = 60;

export interface RankedChunk {
  chunkId: string;
  url: string;
  title: string;
  content: string;
}

export interface SourceRanking<T extends RankedChunk> {
  source: RetrievalSource;
  weight: number;
  results: T[];
}

export interface FusedChunk<T extends RankedChunk> {
  chunk: T;
  score: number;
  sources: RetrievalSource[];
}

export function weightedReciprocalRankFusion<T extends RankedChunk>(
  rankings: SourceRanking<T>[],
  topK: number,
): FusedChunk<T>[] {
  const fused = new Map<string, FusedChunk<T>>();

  for (const { source, weight, results } of rankings) {
    if (weight <= 0) {
      continue;
    }
    results.forEach((chunk, index) => {
      const contribution = weight / (RRF_K + index + 1);
      const existing = fused.get(chunk.chunkId);
      if (existing) {
        existing.score += contribution;
        if (!existing.sources.includes(source)) {
          existing.sources.push(source);
        }
      } else {
        fused.set(chunk.chunkId, {
          chunk,
          score: contribution,
          sources: [source],
        });
      }
    });
  }

  return [...fused.values()]
    .sort((a, b) => b.score - a.score)
    .slice(0, Math.max(0, topK));
}
