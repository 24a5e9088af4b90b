/**
 * Ingest Linked URL Node
 * When the query text names a URL, that page is ingested before retrieval so
 * the answer can draw on it. A failed ingest only adds a warning.
 */

import { Logger } from '@nestjs/common';
import { errorMessage } from '../../../common/errors/crawl-prime.errors';
import type { IngestReport } from '../../orchestrator.types';
import type { QueryStateType } from '../query-state';

const logger = new Logger('IngestLinkedUrlNode');

export type LinkedUrlIngest = (
  url: string,
  collection: string,
) => Promise<IngestReport>;

export function createIngestLinkedUrlNode(ingest: LinkedUrlIngest) {
  return async (state: QueryStateType): Promise<Partial<QueryStateType>> => {
    if (!state.linkedUrl) {
      return {};
    }

    try {
      const report = await ingest(state.linkedUrl, state.collection);
      logger.log(
        `[IngestLinkedUrl] url=${state.linkedUrl} chunks=${report.chunksIngested}`,
      );
      return {};
    } catch (error) {
      logger.warn(
        `[IngestLinkedUrl] failed url=${state.linkedUrl} error=${errorMessage(error)}`,
      );
      return {
        warnings: [
          `Could not ingest ${state.linkedUrl}: ${errorMessage(error)}`,
        ],
      };
    }
  };
}
