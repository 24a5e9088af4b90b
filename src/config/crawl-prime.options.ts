import { ConfigService } from '@nestjs/config';
import type { RetrievalWeights } from '../weights/weights.types';

export const CRAWL_PRIME_OPTIONS = Symbol('CRAWL_PRIME_OPTIONS');

export interface CrawlPrimeOptions {
  collection: string;
  qdrant: {
    host: string;
    port: number;
    apiKey?: string;
  };
  graph: {
    enabled: boolean;
    uri: string;
    user: string;
    password: string;
    probeTimeoutMs: number;
    probeCacheMs: number;
  };
  weights: RetrievalWeights;
  crawl: {
    maxPages: number;
    maxDepth: number;
    timeoutMs: number;
    userAgent: string;
  };
  query: {
    topK: number;
    autoIngestLinkedUrls: boolean;
  };
  jobs: {
    retentionMs: number;
    sweepIntervalMs: number;
    /** 0 means unbounded. */
    concurrency: number;
  };
  enableSynthesis: boolean;
  enableSummarization: boolean;
  enableClustering: boolean;
  storagePath: string;
}

export const DEFAULT_CRAWL_PRIME_OPTIONS: CrawlPrimeOptions = {
  collection: 'crawlprime_default',
  qdrant: { host: 'localhost', port: 6333 },
  graph: {
    enabled: true,
    uri: 'bolt://localhost:7687',
    user: 'neo4j',
    password: 'password',
    probeTimeoutMs: 1500,
    probeCacheMs: 0,
  },
  weights: { vector: 0.6, graph: 0.3, lexical: 0.1 },
  crawl: {
    maxPages: 20,
    maxDepth: 1,
    timeoutMs: 15000,
    userAgent: 'CrawlPrime/1.0',
  },
  query: { topK: 10, autoIngestLinkedUrls: false },
  jobs: { retentionMs: 3_600_000, sweepIntervalMs: 60_000, concurrency: 0 },
  enableSynthesis: true,
  enableSummarization: false,
  enableClustering: false,
  storagePath: 'data/crawlprime',
};

const TRUE_LITERALS = new Set(['1', 'true', 'yes', 'on']);
const FALSE_LITERALS = new Set(['0', 'false', 'no', 'off']);

function readString(
  config: ConfigService,
  key: string,
  fallback: string,
): string {
  const raw = config.get<string>(key);
  if (typeof raw !== 'string') {
    return fallback;
  }
  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : fallback;
}

function readNumber(
  config: ConfigService,
  key: string,
  fallback: number,
): number {
  const raw = config.get<string | number>(key);
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = typeof raw === 'number' ? raw : Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

function readBoolean(
  config: ConfigService,
  key: string,
  fallback: boolean,
): boolean {
  const raw = config.get<string | boolean>(key);
  if (typeof raw === 'boolean') {
    return raw;
  }
  if (typeof raw !== 'string') {
    return fallback;
  }
  const normalized = raw.trim().toLowerCase();
  if (TRUE_LITERALS.has(normalized)) {
    return true;
  }
  if (FALSE_LITERALS.has(normalized)) {
    return false;
  }
  return fallback;
}

/**
 * Builds the runtime options from ConfigService. Values were already
 * range-checked by `validate`; anything missing falls back to the defaults.
 */
export function loadCrawlPrimeOptions(
  config: ConfigService,
): CrawlPrimeOptions {
  const defaults = DEFAULT_CRAWL_PRIME_OPTIONS;
  const neo4jHost = readString(config, 'NEO4J_HOST', 'localhost');
  const neo4jPort = readNumber(config, 'NEO4J_PORT', 7687);
  const qdrantApiKey = config.get<string>('QDRANT_API_KEY');

  return {
    collection: readString(config, 'CRAWLPRIME_COLLECTION', defaults.collection),
    qdrant: {
      host: readString(config, 'QDRANT_HOST', defaults.qdrant.host),
      port: readNumber(config, 'QDRANT_PORT', defaults.qdrant.port),
      ...(qdrantApiKey ? { apiKey: qdrantApiKey } : {}),
    },
    graph: {
      enabled: readBoolean(config, 'GRAPH_ENABLED', defaults.graph.enabled),
      uri: `bolt://${neo4jHost}:${neo4jPort}`,
      user: readString(config, 'NEO4J_USER', defaults.graph.user),
      password: readString(config, 'NEO4J_PASSWORD', defaults.graph.password),
      probeTimeoutMs: readNumber(
        config,
        'GRAPH_PROBE_TIMEOUT_MS',
        defaults.graph.probeTimeoutMs,
      ),
      probeCacheMs: readNumber(
        config,
        'GRAPH_PROBE_CACHE_MS',
        defaults.graph.probeCacheMs,
      ),
    },
    weights: {
      vector: readNumber(config, 'VECTOR_WEIGHT', defaults.weights.vector),
      graph: readNumber(config, 'GRAPH_WEIGHT', defaults.weights.graph),
      lexical: readNumber(config, 'LEXICAL_WEIGHT', defaults.weights.lexical),
    },
    crawl: {
      maxPages: readNumber(config, 'CRAWL_MAX_PAGES', defaults.crawl.maxPages),
      maxDepth: readNumber(config, 'CRAWL_MAX_DEPTH', defaults.crawl.maxDepth),
      timeoutMs: readNumber(
        config,
        'CRAWL_TIMEOUT_MS',
        defaults.crawl.timeoutMs,
      ),
      userAgent: readString(
        config,
        'CRAWL_USER_AGENT',
        defaults.crawl.userAgent,
      ),
    },
    query: {
      topK: readNumber(config, 'QUERY_TOP_K', defaults.query.topK),
      autoIngestLinkedUrls: readBoolean(
        config,
        'QUERY_AUTO_INGEST',
        defaults.query.autoIngestLinkedUrls,
      ),
    },
    jobs: {
      retentionMs: readNumber(
        config,
        'JOB_RETENTION_MS',
        defaults.jobs.retentionMs,
      ),
      sweepIntervalMs: readNumber(
        config,
        'JOB_SWEEP_INTERVAL_MS',
        defaults.jobs.sweepIntervalMs,
      ),
      concurrency: readNumber(
        config,
        'INGEST_CONCURRENCY',
        defaults.jobs.concurrency,
      ),
    },
    enableSynthesis: readBoolean(
      config,
      'ENABLE_SYNTHESIS',
      defaults.enableSynthesis,
    ),
    enableSummarization: readBoolean(
      config,
      'ENABLE_SUMMARIZATION',
      defaults.enableSummarization,
    ),
    enableClustering: readBoolean(
      config,
      'ENABLE_CLUSTERING',
      defaults.enableClustering,
    ),
    storagePath: readString(config, 'STORAGE_PATH', defaults.storagePath),
  };
}
