/**
 * Query Workflow Service
 * LangGraph.js StateGraph for answering a question against ingested web
 * content. Stage failures are recorded in state by the nodes and turned
 * into CollaboratorUnavailableError once the graph has finished.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { END, START, StateGraph } from '@langchain/langgraph';
import {
  CRAWL_PRIME_OPTIONS,
  type CrawlPrimeOptions,
} from '../../config/crawl-prime.options';
import { CollaboratorUnavailableError } from '../../common/errors/crawl-prime.errors';
import {
  ANSWER_SYNTHESIZER,
  RETRIEVER,
  type AnswerSynthesizer,
  type Retriever,
} from '../../collaborators/collaborator.interfaces';
import { GraphReachabilityService } from '../../weights/graph-reachability.service';
import type { RetrievalWeights } from '../../weights/weights.types';
import { PlanExecutorService } from '../plan-executor.service';
import type { QueryAnswer } from '../orchestrator.types';
import {
  createIngestLinkedUrlNode,
  type LinkedUrlIngest,
} from './nodes/ingest-linked-url.node';
import { createResolveWeightsNode } from './nodes/resolve-weights.node';
import { createRetrieveNode } from './nodes/retrieve.node';
import { createSynthesizeNode } from './nodes/synthesize.node';
import {
  createInitialQueryState,
  isQueryStateType,
  QueryState,
  type QueryInput,
  type QueryStateType,
} from './query-state';

interface QueryGraphDependencies {
  ingest: LinkedUrlIngest;
  reachability: GraphReachabilityService;
  declaredWeights: RetrievalWeights;
  retriever: Retriever;
  synthesizer: AnswerSynthesizer | null;
}

export function buildQueryGraph(deps: QueryGraphDependencies) {
  return new StateGraph(QueryState)
    .addNode('ingestLinkedUrl', createIngestLinkedUrlNode(deps.ingest))
    .addNode(
      'resolveWeights',
      createResolveWeightsNode(deps.reachability, deps.declaredWeights),
    )
    .addNode('retrieve', createRetrieveNode(deps.retriever))
    .addNode('synthesize', createSynthesizeNode(deps.synthesizer))
    .addConditionalEdges(
      START,
      (state: QueryStateType) => (state.linkedUrl ? 'linked' : 'plain'),
      {
        linked: 'ingestLinkedUrl',
        plain: 'resolveWeights',
      },
    )
    .addEdge('ingestLinkedUrl', 'resolveWeights')
    .addEdge('resolveWeights', 'retrieve')
    .addConditionalEdges(
      'retrieve',
      (state: QueryStateType) => (state.failure ? 'failed' : 'continue'),
      {
        failed: END,
        continue: 'synthesize',
      },
    )
    .addEdge('synthesize', END)
    .compile();
}

type CompiledQueryGraph = ReturnType<typeof buildQueryGraph>;

@Injectable()
export class QueryWorkflowService {
  private readonly logger = new Logger(QueryWorkflowService.name);
  private readonly graph: CompiledQueryGraph;

  constructor(
    @Inject(CRAWL_PRIME_OPTIONS) private readonly options: CrawlPrimeOptions,
    private readonly planExecutor: PlanExecutorService,
    private readonly reachability: GraphReachabilityService,
    @Inject(RETRIEVER) private readonly retriever: Retriever,
    @Inject(ANSWER_SYNTHESIZER) private readonly synthesizer: AnswerSynthesizer,
  ) {
    this.graph = buildQueryGraph({
      ingest: (url, collection) => this.planExecutor.run(url, { collection }),
      reachability: this.reachability,
      declaredWeights: this.options.weights,
      retriever: this.retriever,
      synthesizer: this.options.enableSynthesis ? this.synthesizer : null,
    });
    this.logger.log(
      `Query workflow initialized (synthesis=${this.options.enableSynthesis}, auto_ingest=${this.options.query.autoIngestLinkedUrls})`,
    );
  }

  async run(input: QueryInput): Promise<QueryAnswer> {
    const startTime = Date.now();
    const result: unknown = await this.graph.invoke(
      createInitialQueryState(input),
    );

    if (!isQueryStateType(result)) {
      throw new Error('Invalid workflow result - type guard failed');
    }
    if (result.failure) {
      throw new CollaboratorUnavailableError(
        result.failure.stage,
        result.failure.message,
        result.failure.cause,
      );
    }
    if (!result.weights) {
      throw new Error('Invalid workflow result - weights missing');
    }

    this.logger.log(
      `[Query] results=${result.hits.length} synthesized=${result.synthesized} warnings=${result.warnings.length} duration=${Date.now() - startTime}ms`,
    );

    return {
      query: result.query,
      answer: result.answer,
      results: result.hits,
      weights: result.weights,
      synthesized: result.synthesized,
      warnings: result.warnings,
    };
  }
}
