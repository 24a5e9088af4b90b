import { Logger } from '@nestjs/common';
import { errorMessage } from '../../../common/errors/crawl-prime.errors';
import type { Retriever } from '../../../collaborators/collaborator.interfaces';
import type { QueryStateType } from '../query-state';

const logger = new Logger('RetrieveNode');

export function createRetrieveNode(retriever: Retriever) {
  return async (state: QueryStateType): Promise<Partial<QueryStateType>> => {
    if (!state.weights) {
      return {
        failure: { stage: 'retrieve', message: 'weights were not resolved' },
      };
    }

    const startTime = Date.now();
    try {
      const hits = await retriever.retrieve({
        query: state.query,
        weights: state.weights,
        topK: state.topK,
        collection: state.collection,
      });
      logger.log(
        `[Retrieve] results=${hits.length} top_k=${state.topK} duration=${Date.now() - startTime}ms`,
      );
      return { hits };
    } catch (error) {
      logger.error(`[Retrieve] failed error=${errorMessage(error)}`);
      return {
        failure: {
          stage: 'retrieve',
          message: errorMessage(error),
          cause: error instanceof Error ? error : undefined,
        },
      };
    }
  };
}
