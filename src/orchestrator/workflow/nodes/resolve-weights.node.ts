import { Logger } from '@nestjs/common';
import type { GraphReachabilityService } from '../../../weights/graph-reachability.service';
import { resolveWeights } from '../../../weights/weight-resolver';
import type { RetrievalWeights } from '../../../weights/weights.types';
import type { QueryStateType } from '../query-state';

const logger = new Logger('ResolveWeightsNode');

export const GRAPH_UNREACHABLE_WARNING =
  'Graph backend unreachable; graph weight redistributed to vector and lexical retrieval';

/** Probes the graph backend once per query and resolves effective weights. */
export function createResolveWeightsNode(
  reachability: GraphReachabilityService,
  declared: RetrievalWeights,
) {
  return async (state: QueryStateType): Promise<Partial<QueryStateType>> => {
    const graphReachable = await reachability.isReachable();
    const weights = resolveWeights(declared, graphReachable);

    logger.log(
      `[ResolveWeights] graph_reachable=${graphReachable} vector=${weights.vector.toFixed(3)} graph=${weights.graph.toFixed(3)} lexical=${weights.lexical.toFixed(3)} collection=${state.collection}`,
    );

    return {
      graphReachable,
      weights,
      warnings:
        !graphReachable && declared.graph > 0 ? [GRAPH_UNREACHABLE_WARNING] : [],
    };
  };
}
