/**
 * Synthesize Node
 * With synthesis enabled the answer comes from the synthesizer; otherwise
 * the retrieved chunk contents are returned as the answer.
 */

import { Logger } from '@nestjs/common';
import { errorMessage } from '../../../common/errors/crawl-prime.errors';
import type {
  AnswerSynthesizer,
  RetrievalHit,
} from '../../../collaborators/collaborator.interfaces';
import type { QueryStateType } from '../query-state';

const logger = new Logger('SynthesizeNode');

export function rawContext(hits: RetrievalHit[]): string {
  return hits.map((hit) => hit.content).join('\n\n');
}

export function createSynthesizeNode(synthesizer: AnswerSynthesizer | null) {
  return async (state: QueryStateType): Promise<Partial<QueryStateType>> => {
    if (!synthesizer) {
      return { answer: rawContext(state.hits), synthesized: false };
    }

    try {
      const answer = await synthesizer.synthesize(state.query, state.hits);
      return { answer, synthesized: true };
    } catch (error) {
      logger.error(`[Synthesize] failed error=${errorMessage(error)}`);
      return {
        failure: {
          stage: 'synthesize',
          message: errorMessage(error),
          cause: error instanceof Error ? error : undefined,
        },
      };
    }
  };
}
