/**
 * Query Workflow State Definition
 * LangGraph.js Annotation.Root for the query pipeline:
 * ingestLinkedUrl → resolveWeights → retrieve → synthesize
 */

import { Annotation } from '@langchain/langgraph';
import type { RetrievalHit } from '../../collaborators/collaborator.interfaces';
import type { RetrievalWeights } from '../../weights/weights.types';

export interface StageFailure {
  stage: string;
  message: string;
  cause?: Error;
}

export interface QueryInput {
  query: string;
  collection: string;
  topK: number;
  /** URL found in the query text, ingested before retrieval when set. */
  linkedUrl: string | null;
}

export const QueryState = Annotation.Root({
  // Input
  query: Annotation<string>,
  collection: Annotation<string>,
  topK: Annotation<number>,
  linkedUrl: Annotation<string | null>,

  // Weight resolution
  graphReachable: Annotation<boolean>,
  weights: Annotation<RetrievalWeights | null>,

  // Retrieval and synthesis
  hits: Annotation<RetrievalHit[]>,
  answer: Annotation<string>,
  synthesized: Annotation<boolean>,

  // Metadata
  warnings: Annotation<string[]>({
    reducer: (current, update) => current.concat(update),
    default: () => [],
  }),
  failure: Annotation<StageFailure | null>,
});

export type QueryStateType = typeof QueryState.State;

export function createInitialQueryState(input: QueryInput): QueryStateType {
  return {
    query: input.query,
    collection: input.collection,
    topK: input.topK,
    linkedUrl: input.linkedUrl,
    graphReachable: false,
    weights: null,
    hits: [],
    answer: '',
    synthesized: false,
    warnings: [],
    failure: null,
  };
}

export function isQueryStateType(value: unknown): value is QueryStateType {
  return (
    typeof value === 'object' &&
    value !== null &&
    'query' in value &&
    typeof value.query === 'string' &&
    'hits' in value &&
    Array.isArray(value.hits) &&
    'answer' in value &&
    typeof value.answer === 'string' &&
    'warnings' in value &&
    Array.isArray(value.warnings)
  );
}
