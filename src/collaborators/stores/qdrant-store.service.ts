/**
 * Qdrant Store Service
 * Collection bootstrap, chunk upsert, dense search and full-text match for
 * web chunks. One collection per namespace, one named "dense" vector per point.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { QdrantClient } from '@qdrant/js-client-rest';
import * as crypto from 'crypto';
import {
  CRAWL_PRIME_OPTIONS,
  type CrawlPrimeOptions,
} from '../../config/crawl-prime.options';
import { errorMessage } from '../../common/errors/crawl-prime.errors';
import type { VectorStoreHealth } from '../collaborator.interfaces';
import { EmbeddingProviderFactory } from '../providers/embedding-provider.factory';

export interface ChunkPayload {
  chunkId: string;
  url: string;
  title: string;
  section: string;
  content: string;
  chunkIndex: number;
  crawledAt: string;
}

export interface ChunkPoint {
  payload: ChunkPayload;
  vector: number[];
}

export interface StoredChunk extends ChunkPayload {
  score: number;
}

const UPSERT_BATCH_SIZE = 64;

function readString(payload: Record<string, unknown>, key: string): string {
  const value = payload[key];
  return typeof value === 'string' ? value : '';
}

export function toStoredChunk(
  payload: Record<string, unknown> | null | undefined,
  score: number,
): StoredChunk | null {
  if (!payload) {
    return null;
  }
  const chunkId = readString(payload, 'chunkId');
  if (!chunkId) {
    return null;
  }
  const chunkIndex = payload.chunkIndex;
  return {
    chunkId,
    url: readString(payload, 'url'),
    title: readString(payload, 'title'),
    section: readString(payload, 'section'),
    content: readString(payload, 'content'),
    chunkIndex: typeof chunkIndex === 'number' ? chunkIndex : 0,
    crawledAt: readString(payload, 'crawledAt'),
    score,
  };
}

/** Deterministic UUID-shaped point id, so re-ingesting a page overwrites it. */
export function chunkPointId(chunkId: string): string {
  const hash = crypto.createHash('md5').update(chunkId).digest('hex');
  const variant = ((parseInt(hash.slice(16, 18), 16) & 0x3f) | 0x80).toString(
    16,
  );
  return `${hash.slice(0, 8)}-${hash.slice(8, 12)}-4${hash.slice(13, 16)}-${variant}${hash.slice(18, 20)}-${hash.slice(20, 32)}`;
}

@Injectable()
export class QdrantStoreService implements VectorStoreHealth {
  private readonly logger = new Logger(QdrantStoreService.name);
  private readonly client: QdrantClient;
  private readonly ensured = new Set<string>();

  constructor(
    @Inject(CRAWL_PRIME_OPTIONS) options: CrawlPrimeOptions,
    private readonly embeddingProviderFactory: EmbeddingProviderFactory,
  ) {
    const { host, port, apiKey } = options.qdrant;
    this.client = new QdrantClient({ host, port, apiKey });
    this.logger.log(`QdrantClient initialized: ${host}:${port}`);
  }

  async ensureCollection(collection: string): Promise<void> {
    if (this.ensured.has(collection)) {
      return;
    }

    try {
      await this.client.getCollection(collection);
    } catch {
      const size = this.embeddingProviderFactory.getEmbeddingDimensions();
      this.logger.log(`Creating collection "${collection}" (${size}D)`);
      await this.client.createCollection(collection, {
        vectors: {
          dense: { size, distance: 'Cosine' },
        },
      });
      await this.createPayloadIndexes(collection);
    }

    this.ensured.add(collection);
  }

  async upsertChunks(collection: string, points: ChunkPoint[]): Promise<number> {
    let upserted = 0;
    for (let i = 0; i < points.length; i += UPSERT_BATCH_SIZE) {
      const batch = points.slice(i, i + UPSERT_BATCH_SIZE);
      await this.client.upsert(collection, {
        wait: true,
        points: batch.map((point) => ({
          id: chunkPointId(point.payload.chunkId),
          vector: { dense: point.vector },
          payload: { ...point.payload },
        })),
      });
      upserted += batch.length;
    }
    return upserted;
  }

  /**
   * Drops a page's chunks from `fromIndex` on: what is left over once a
   * shorter version of the page has been upserted over the old one.
   */
  async deleteStaleChunks(
    collection: string,
    url: string,
    fromIndex: number,
  ): Promise<void> {
    await this.client.delete(collection, {
      wait: true,
      filter: {
        must: [
          { key: 'url', match: { value: url } },
          { key: 'chunkIndex', range: { gte: fromIndex } },
        ],
      },
    });
  }

  async searchDense(
    collection: string,
    vector: number[],
    limit: number,
  ): Promise<StoredChunk[]> {
    const points = await this.client.search(collection, {
      vector: { name: 'dense', vector },
      limit,
      with_payload: true,
    });
    return points
      .map((point) => toStoredChunk(point.payload, point.score))
      .filter((chunk): chunk is StoredChunk => chunk !== null);
  }

  /**
   * Chunks whose `content` contains any of the terms (needs the text payload
   * index). Qdrant gives no relevance score for filters, so the caller ranks
   * the candidates.
   */
  async searchText(
    collection: string,
    terms: string[],
    limit: number,
  ): Promise<StoredChunk[]> {
    if (terms.length === 0) {
      return [];
    }
    const response = await this.client.scroll(collection, {
      filter: {
        should: terms.map((term) => ({ key: 'content', match: { text: term } })),
      },
      limit,
      with_payload: true,
      with_vector: false,
    });
    return response.points
      .map((point) => toStoredChunk(point.payload, 0))
      .filter((chunk): chunk is StoredChunk => chunk !== null);
  }

  async getChunks(collection: string, chunkIds: string[]): Promise<StoredChunk[]> {
    if (chunkIds.length === 0) {
      return [];
    }
    const points = await this.client.retrieve(collection, {
      ids: chunkIds.map(chunkPointId),
      with_payload: true,
      with_vector: false,
    });
    return points
      .map((point) => toStoredChunk(point.payload, 0))
      .filter((chunk): chunk is StoredChunk => chunk !== null);
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.getCollections();
      return true;
    } catch (error) {
      this.logger.warn(`Qdrant health check failed: ${errorMessage(error)}`);
      return false;
    }
  }

  private async createPayloadIndexes(collection: string): Promise<void> {
    try {
      await this.client.createPayloadIndex(collection, {
        field_name: 'url',
        field_schema: 'keyword',
      });
      await this.client.createPayloadIndex(collection, {
        field_name: 'chunkIndex',
        field_schema: 'integer',
      });
      await this.client.createPayloadIndex(collection, {
        field_name: 'content',
        field_schema: {
          type: 'text',
          tokenizer: 'word',
          lowercase: true,
        },
      });
    } catch (error) {
      // Indexes may already exist.
      this.logger.warn(
        `Could not create payload indexes for "${collection}": ${errorMessage(error)}`,
      );
    }
  }
}
