import {
  Inject,
  Injectable,
  Logger,
  OnApplicationShutdown,
} from '@nestjs/common';
import neo4j, { Driver } from 'neo4j-driver';
import {
  CRAWL_PRIME_OPTIONS,
  type CrawlPrimeOptions,
} from '../../config/crawl-prime.options';
import { errorMessage } from '../../common/errors/crawl-prime.errors';
import type { GraphBackend } from '../collaborator.interfaces';

export const GRAPH_STORE = Symbol('GRAPH_STORE');

export interface PageGraphInput {
  url: string;
  title: string;
  links: string[];
  chunkIds: string[];
}

export interface RelatedChunk {
  chunkId: string;
  weight: number;
}

const MERGE_PAGE = `
MERGE (p:Page {url: $url})
SET p.title = $title, p.collection = $collection, p.updatedAt = timestamp()
WITH p
UNWIND $chunkIds AS chunkId
MERGE (c:Chunk {id: chunkId})
MERGE (p)-[:HAS_CHUNK]->(c)
`;

const MERGE_LINKS = `
MATCH (p:Page {url: $url})
UNWIND $links AS link
MERGE (q:Page {url: link})
MERGE (p)-[:LINKS_TO]->(q)
`;

// Chunks of the same pages and of pages one link away, ranked by how many
// seed chunks reach them.
const RELATED_CHUNKS = `
MATCH (seed:Chunk)<-[:HAS_CHUNK]-(p:Page)
WHERE seed.id IN $chunkIds
OPTIONAL MATCH (p)-[:LINKS_TO]-(q:Page)
WITH collect(DISTINCT p) + collect(DISTINCT q) AS pages
UNWIND pages AS page
MATCH (page)-[:HAS_CHUNK]->(c:Chunk)
WHERE NOT c.id IN $chunkIds
RETURN c.id AS chunkId, count(*) AS weight
ORDER BY weight DESC
LIMIT $limit
`;

/**
 * Page/chunk/link graph in Neo4j. The driver is created lazily, so a graph
 * that is down only costs a failed probe.
 */
@Injectable()
export class Neo4jGraphStore implements GraphBackend, OnApplicationShutdown {
  private readonly logger = new Logger(Neo4jGraphStore.name);
  private driver: Driver | null = null;

  constructor(
    @Inject(CRAWL_PRIME_OPTIONS) private readonly options: CrawlPrimeOptions,
  ) {}

  async isReachable(): Promise<boolean> {
    const timeoutMs = this.options.graph.probeTimeoutMs;
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new Error(`no answer within ${timeoutMs}ms`)),
        timeoutMs,
      );
    });

    try {
      await Promise.race([this.getDriver().verifyConnectivity(), timeout]);
      return true;
    } catch (error) {
      this.logger.warn(`[GraphProbe] neo4j unreachable: ${errorMessage(error)}`);
      return false;
    } finally {
      clearTimeout(timer);
    }
  }

  async writePage(collection: string, page: PageGraphInput): Promise<void> {
    const session = this.getDriver().session();
    try {
      await session.executeWrite(async (tx) => {
        await tx.run(MERGE_PAGE, {
          url: page.url,
          title: page.title,
          collection,
          chunkIds: page.chunkIds,
        });
        if (page.links.length > 0) {
          await tx.run(MERGE_LINKS, { url: page.url, links: page.links });
        }
      });
    } finally {
      await session.close();
    }
  }

  async relatedChunks(
    chunkIds: string[],
    limit: number,
  ): Promise<RelatedChunk[]> {
    if (chunkIds.length === 0) {
      return [];
    }

    const session = this.getDriver().session();
    try {
      const result = await session.executeRead((tx) =>
        tx.run(RELATED_CHUNKS, { chunkIds, limit: neo4j.int(limit) }),
      );
      const related: RelatedChunk[] = [];
      for (const record of result.records) {
        const chunkId: unknown = record.get('chunkId');
        const weight: unknown = record.get('weight');
        if (typeof chunkId === 'string') {
          related.push({
            chunkId,
            weight: neo4j.isInt(weight) ? weight.toNumber() : 1,
          });
        }
      }
      return related;
    } finally {
      await session.close();
    }
  }

  async onApplicationShutdown(): Promise<void> {
    if (this.driver) {
      await this.driver.close();
      this.driver = null;
    }
  }

  private getDriver(): Driver {
    if (!this.driver) {
      const { uri, user, password, probeTimeoutMs } = this.options.graph;
      this.driver = neo4j.driver(uri, neo4j.auth.basic(user, password), {
        connectionTimeout: probeTimeoutMs,
        connectionAcquisitionTimeout: probeTimeoutMs * 2,
      });
      this.logger.log(`Neo4j driver created for ${uri}`);
    }
    return this.driver;
  }
}
