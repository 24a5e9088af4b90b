/**
 * Web Ingestion Service
 * Chunks mapped documents section by section, embeds the chunks, writes them to
 * Qdrant and records the page/link structure in the graph store.
 *
 * A document that fails to chunk, embed or persist is reported and skipped.
 * If no document makes it, the stage itself is considered down and throws.
 */

import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { RecursiveCharacterTextSplitter } from '@langchain/textsplitters';
import * as crypto from 'crypto';
import { errorMessage } from '../../common/errors/crawl-prime.errors';
import type {
  IngestionOptions,
  IngestionPipeline,
  IngestionResult,
  StructuredDocument,
  SubResourceFailure,
} from '../collaborator.interfaces';
import { documentSections } from '../mapping/html-structure.mapper';
import { EmbeddingProviderFactory } from '../providers/embedding-provider.factory';
import { GRAPH_STORE, Neo4jGraphStore } from '../stores/neo4j-graph.store';
import {
  QdrantStoreService,
  type ChunkPayload,
} from '../stores/qdrant-store.service';

const CHUNK_SIZE = 1000;
const CHUNK_OVERLAP = 150;

export function chunkIdFor(url: string, index: number): string {
  const digest = crypto.createHash('sha1').update(url).digest('hex');
  return `${digest.slice(0, 16)}-${index}`;
}

@Injectable()
export class WebIngestionService implements IngestionPipeline {
  private readonly logger = new Logger(WebIngestionService.name);
  private readonly splitter = new RecursiveCharacterTextSplitter({
    chunkSize: CHUNK_SIZE,
    chunkOverlap: CHUNK_OVERLAP,
    separators: ['\n\n', '\n', '. ', ', ', ' ', ''],
  });

  constructor(
    private readonly qdrantStore: QdrantStoreService,
    private readonly embeddingProviderFactory: EmbeddingProviderFactory,
    @Optional()
    @Inject(GRAPH_STORE)
    private readonly graphStore: Neo4jGraphStore | null,
  ) {}

  async ingest(
    documents: StructuredDocument[],
    options: IngestionOptions,
  ): Promise<IngestionResult> {
    const startTime = Date.now();
    await this.qdrantStore.ensureCollection(options.collection);

    const failed: SubResourceFailure[] = [];
    let chunksIngested = 0;
    let documentsIngested = 0;

    for (const document of documents) {
      try {
        const chunkIds = await this.ingestDocument(document, options.collection);
        chunksIngested += chunkIds.length;
        documentsIngested += 1;
        await this.recordGraph(document, chunkIds, options.collection);
      } catch (error) {
        this.logger.warn(
          `[Ingest] document failed url=${document.url} error=${errorMessage(error)}`,
        );
        failed.push({
          resource: document.url,
          stage: 'ingest',
          reason: errorMessage(error),
        });
      }
    }

    if (documents.length > 0 && documentsIngested === 0) {
      throw new Error(
        `no document could be ingested (first failure: ${failed[0]?.reason ?? 'unknown'})`,
      );
    }

    this.logger.log(
      `[Ingest] collection=${options.collection} documents=${documentsIngested}/${documents.length} chunks=${chunksIngested} duration=${Date.now() - startTime}ms`,
    );
    return { chunksIngested, failed };
  }

  async chunkDocument(document: StructuredDocument): Promise<ChunkPayload[]> {
    const chunks: ChunkPayload[] = [];
    for (const section of documentSections(document)) {
      const pieces = await this.splitter.splitText(section.text);
      for (const piece of pieces) {
        const content = piece.trim();
        if (!content) {
          continue;
        }
        const chunkIndex = chunks.length;
        chunks.push({
          chunkId: chunkIdFor(document.url, chunkIndex),
          url: document.url,
          title: document.title,
          section: section.heading,
          content,
          chunkIndex,
          crawledAt: document.crawledAt,
        });
      }
    }
    return chunks;
  }

  private async ingestDocument(
    document: StructuredDocument,
    collection: string,
  ): Promise<string[]> {
    const chunks = await this.chunkDocument(document);
    if (chunks.length === 0) {
      await this.qdrantStore.deleteStaleChunks(collection, document.url, 0);
      return [];
    }

    // Embedded text carries the section path.
    const vectors = await this.embeddingProviderFactory
      .getEmbeddingModel()
      .embedDocuments(
        chunks.map((chunk) => `${chunk.section}\n\n${chunk.content}`),
      );
    if (vectors.length !== chunks.length) {
      throw new Error(
        `embedding model returned ${vectors.length} vectors for ${chunks.length} chunks`,
      );
    }

    await this.qdrantStore.upsertChunks(
      collection,
      chunks.map((payload, index) => ({ payload, vector: vectors[index] })),
    );
    await this.qdrantStore.deleteStaleChunks(
      collection,
      document.url,
      chunks.length,
    );
    return chunks.map((chunk) => chunk.chunkId);
  }

  /** Graph writes are best effort: the graph backend is optional. */
  private async recordGraph(
    document: StructuredDocument,
    chunkIds: string[],
    collection: string,
  ): Promise<void> {
    if (!this.graphStore) {
      return;
    }
    try {
      await this.graphStore.writePage(collection, {
        url: document.url,
        title: document.title,
        links: document.links,
        chunkIds,
      });
    } catch (error) {
      this.logger.warn(
        `[Ingest] graph write skipped url=${document.url} error=${errorMessage(error)}`,
      );
    }
  }
}
