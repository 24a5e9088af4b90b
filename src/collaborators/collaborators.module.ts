/**
 * Collaborators Module
 * Default stage implementations bound to the interface tokens the
 * orchestrator depends on. Any token can be overridden with another
 * implementation without touching the orchestration core.
 */

import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import {
  CRAWL_PRIME_OPTIONS,
  type CrawlPrimeOptions,
} from '../config/crawl-prime.options';
import {
  ANSWER_SYNTHESIZER,
  ARTIFACT_WRITER,
  CLUSTERER,
  GRAPH_BACKEND,
  HTML_MAPPER,
  INGESTION_PIPELINE,
  RETRIEVER,
  SUMMARIZER,
  VECTOR_STORE_HEALTH,
  WEB_CRAWLER,
  type ArtifactWriter,
} from './collaborator.interfaces';
import { FileArtifactWriter } from './artifacts/file-artifact.writer';
import { HttpCrawlerService } from './crawl/http-crawler.service';
import { WebIngestionService } from './ingestion/web-ingestion.service';
import { HtmlStructureMapper } from './mapping/html-structure.mapper';
import { LlmSummaryPostProcessor } from './postprocess/llm-summary.post-processor';
import { UrlClusterPostProcessor } from './postprocess/url-cluster.post-processor';
import { EmbeddingProviderFactory } from './providers/embedding-provider.factory';
import { LLMProviderFactory } from './providers/llm-provider.factory';
import { HybridRetrieverService } from './retrieval/hybrid-retriever.service';
import { GRAPH_STORE, Neo4jGraphStore } from './stores/neo4j-graph.store';
import { QdrantStoreService } from './stores/qdrant-store.service';
import { AnswerSynthesizerService } from './synthesis/answer-synthesizer.service';

@Module({
  imports: [ConfigModule],
  providers: [
    // Provider factories
    EmbeddingProviderFactory,
    LLMProviderFactory,

    // Stores
    QdrantStoreService,
    {
      provide: GRAPH_STORE,
      useFactory: (options: CrawlPrimeOptions) =>
        options.graph.enabled ? new Neo4jGraphStore(options) : null,
      inject: [CRAWL_PRIME_OPTIONS],
    },
    { provide: GRAPH_BACKEND, useExisting: GRAPH_STORE },
    { provide: VECTOR_STORE_HEALTH, useExisting: QdrantStoreService },

    // Stages
    { provide: WEB_CRAWLER, useClass: HttpCrawlerService },
    { provide: HTML_MAPPER, useClass: HtmlStructureMapper },
    { provide: INGESTION_PIPELINE, useClass: WebIngestionService },
    { provide: RETRIEVER, useClass: HybridRetrieverService },
    { provide: ANSWER_SYNTHESIZER, useClass: AnswerSynthesizerService },
    { provide: ARTIFACT_WRITER, useClass: FileArtifactWriter },

    // Optional post-processing
    {
      provide: SUMMARIZER,
      useFactory: (
        options: CrawlPrimeOptions,
        llmFactory: LLMProviderFactory,
        writer: ArtifactWriter,
      ) =>
        options.enableSummarization
          ? new LlmSummaryPostProcessor(llmFactory, writer)
          : null,
      inject: [CRAWL_PRIME_OPTIONS, LLMProviderFactory, ARTIFACT_WRITER],
    },
    {
      provide: CLUSTERER,
      useFactory: (options: CrawlPrimeOptions, writer: ArtifactWriter) =>
        options.enableClustering ? new UrlClusterPostProcessor(writer) : null,
      inject: [CRAWL_PRIME_OPTIONS, ARTIFACT_WRITER],
    },
  ],
  exports: [
    WEB_CRAWLER,
    HTML_MAPPER,
    INGESTION_PIPELINE,
    RETRIEVER,
    ANSWER_SYNTHESIZER,
    ARTIFACT_WRITER,
    GRAPH_BACKEND,
    VECTOR_STORE_HEALTH,
    SUMMARIZER,
    CLUSTERER,
  ],
})
export class CollaboratorsModule {}
