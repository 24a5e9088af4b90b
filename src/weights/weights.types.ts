/**
 * Relative importance of the three retrieval sources. Resolved weights are
 * non-negative and sum to 1.
 */
export interface RetrievalWeights {
  vector: number;
  graph: number;
  lexical: number;
}

export const RETRIEVAL_SOURCES = ['vector', 'graph', 'lexical'] as const;

export type RetrievalSource = (typeof RETRIEVAL_SOURCES)[number];
