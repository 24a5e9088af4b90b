import { ValidationError } from '../common/errors/crawl-prime.errors';
import { RETRIEVAL_SOURCES, type RetrievalWeights } from './weights.types';

const VECTOR_ONLY: RetrievalWeights = { vector: 1, graph: 0, lexical: 0 };

export function assertValidWeights(declared: RetrievalWeights): void {
  for (const source of RETRIEVAL_SOURCES) {
    const value = declared[source];
    if (!Number.isFinite(value) || value < 0) {
      throw new ValidationError(
        `${source} weight must be a finite non-negative number, got ${value}`,
      );
    }
  }
}

/**
 * Effective weights for one query. With the graph backend unreachable its
 * share is dropped and vector/lexical are rescaled by their declared sum.
 * Output always sums to 1; an all-zero candidate set falls back to vector only.
 */
export function resolveWeights(
  declared: RetrievalWeights,
  graphReachable: boolean,
): RetrievalWeights {
  assertValidWeights(declared);

  const candidate: RetrievalWeights = graphReachable
    ? { ...declared }
    : { ...declared, graph: 0 };

  const total = candidate.vector + candidate.graph + candidate.lexical;
  if (total <= 0) {
    return { ...VECTOR_ONLY };
  }

  return {
    vector: candidate.vector / total,
    graph: candidate.graph / total,
    lexical: candidate.lexical / total,
  };
}
