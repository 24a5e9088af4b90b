/**
 * Hybrid Retriever Service
 * Vector search in Qdrant, graph expansion over the Neo4j page/link graph and
 * term matching on chunk content, merged with weighted RRF.
 *
 * Vector search is required and its failure propagates. Graph and lexical
 * lists degrade to empty on failure.
 */

import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { errorMessage } from '../../common/errors/crawl-prime.errors';
import type {
  RetrievalHit,
  RetrievalRequest,
  Retriever,
} from '../collaborator.interfaces';
import { EmbeddingProviderFactory } from '../providers/embedding-provider.factory';
import { GRAPH_STORE, Neo4jGraphStore } from '../stores/neo4j-graph.store';
import {
  QdrantStoreService,
  type StoredChunk,
} from '../stores/qdrant-store.service';
import { queryTerms, rankByTerms } from './lexical-ranking';
import {
  weightedReciprocalRankFusion,
  type SourceRanking,
} from './weighted-fusion';

const CANDIDATE_MULTIPLIER = 2;
const LEXICAL_SCAN_MULTIPLIER = 5;
const GRAPH_SEEDS = 5;

@Injectable()
export class HybridRetrieverService implements Retriever {
  private readonly logger = new Logger(HybridRetrieverService.name);

  constructor(
    private readonly qdrantStore: QdrantStoreService,
    private readonly embeddingProviderFactory: EmbeddingProviderFactory,
    @Optional()
    @Inject(GRAPH_STORE)
    private readonly graphStore: Neo4jGraphStore | null,
  ) {}

  async retrieve(request: RetrievalRequest): Promise<RetrievalHit[]> {
    const startTime = Date.now();
    const { query, weights, topK, collection } = request;
    const candidates = topK * CANDIDATE_MULTIPLIER;

    const needsVector = weights.vector > 0 || weights.graph > 0;
    const vectorResults = needsVector
      ? await this.vectorSearch(collection, query, candidates)
      : [];

    const [graphResults, lexicalResults] = await Promise.all([
      weights.graph > 0
        ? this.graphSearch(collection, vectorResults, candidates)
        : Promise.resolve([]),
      weights.lexical > 0
        ? this.lexicalSearch(collection, query, candidates)
        : Promise.resolve([]),
    ]);

    const rankings: SourceRanking<StoredChunk>[] = [
      { source: 'vector', weight: weights.vector, results: vectorResults },
      { source: 'graph', weight: weights.graph, results: graphResults },
      { source: 'lexical', weight: weights.lexical, results: lexicalResults },
    ];
    const fused = weightedReciprocalRankFusion(rankings, topK);

    this.logger.log(
      `[Retrieve] collection=${collection} vector=${vectorResults.length} graph=${graphResults.length} lexical=${lexicalResults.length} fused=${fused.length} duration=${Date.now() - startTime}ms`,
    );

    return fused.map(({ chunk, score, sources }) => ({
      chunkId: chunk.chunkId,
      url: chunk.url,
      title: chunk.title,
      content: chunk.content,
      score,
      sources,
    }));
  }

  private async vectorSearch(
    collection: string,
    query: string,
    limit: number,
  ): Promise<StoredChunk[]> {
    const vector = await this.embeddingProviderFactory
      .getEmbeddingModel()
      .embedQuery(query);
    return this.qdrantStore.searchDense(collection, vector, limit);
  }

  /** Expands from the best vector hits through shared pages and links. */
  private async graphSearch(
    collection: string,
    seeds: StoredChunk[],
    limit: number,
  ): Promise<StoredChunk[]> {
    if (!this.graphStore || seeds.length === 0) {
      return [];
    }
    try {
      const related = await this.graphStore.relatedChunks(
        seeds.slice(0, GRAPH_SEEDS).map((seed) => seed.chunkId),
        limit,
      );
      const chunks = await this.qdrantStore.getChunks(
        collection,
        related.map((entry) => entry.chunkId),
      );
      const byId = new Map(chunks.map((chunk) => [chunk.chunkId, chunk]));
      return related
        .map((entry) => byId.get(entry.chunkId))
        .filter((chunk): chunk is StoredChunk => chunk !== undefined);
    } catch (error) {
      this.logger.warn(`[Retrieve] graph expansion skipped: ${errorMessage(error)}`);
      return [];
    }
  }

  private async lexicalSearch(
    collection: string,
    query: string,
    limit: number,
  ): Promise<StoredChunk[]> {
    const terms = queryTerms(query);
    try {
      const candidates = await this.qdrantStore.searchText(
        collection,
        terms,
        limit * LEXICAL_SCAN_MULTIPLIER,
      );
      return rankByTerms(candidates, terms).slice(0, limit);
    } catch (error) {
      this.logger.warn(`[Retrieve] lexical search skipped: ${errorMessage(error)}`);
      return [];
    }
  }
}
