import type { CrawlMode } from '../planning/plan.types';
import type { RetrievalWeights } from '../weights/weights.types';

export const WEB_CRAWLER = Symbol('WEB_CRAWLER');
export const HTML_MAPPER = Symbol('HTML_MAPPER');
export const INGESTION_PIPELINE = Symbol('INGESTION_PIPELINE');
export const RETRIEVER = Symbol('RETRIEVER');
export const ANSWER_SYNTHESIZER = Symbol('ANSWER_SYNTHESIZER');
export const GRAPH_BACKEND = Symbol('GRAPH_BACKEND');
export const VECTOR_STORE_HEALTH = Symbol('VECTOR_STORE_HEALTH');
export const SUMMARIZER = Symbol('SUMMARIZER');
export const CLUSTERER = Symbol('CLUSTERER');
export const ARTIFACT_WRITER = Symbol('ARTIFACT_WRITER');

/**
 * A partial failure inside an otherwise successful step, e.g. one page of a
 * site crawl that could not be fetched.
 */
export interface SubResourceFailure {
  resource: string;
  stage: string;
  reason: string;
}

export function describeFailure(failure: SubResourceFailure): string {
  return `${failure.resource}: ${failure.reason}`;
}

// Crawl

export interface CrawlRequest {
  url: string;
  mode: CrawlMode;
  maxPages: number;
  maxDepth: number;
}

export interface CrawledPage {
  url: string;
  title: string;
  html: string;
  links: string[];
  crawledAt: string;
}

export interface CrawlResult {
  pages: CrawledPage[];
  failures: SubResourceFailure[];
}

export interface WebCrawler {
  crawl(request: CrawlRequest): Promise<CrawlResult>;
}

// Map

export type StructuredTag =
  | 'title'
  | 'section'
  | 'subsection'
  | 'paragraph'
  | 'list_item'
  | 'code'
  | 'table';

export interface StructuredNode {
  tag: StructuredTag;
  text: string;
  children: StructuredNode[];
}

export interface StructuredDocument {
  url: string;
  title: string;
  crawledAt: string;
  links: string[];
  nodes: StructuredNode[];
}

export interface HtmlMapper {
  map(page: CrawledPage): Promise<StructuredDocument>;
}

// Ingest

export interface IngestionOptions {
  collection: string;
}

export interface IngestionResult {
  chunksIngested: number;
  failed: SubResourceFailure[];
}

export interface IngestionPipeline {
  ingest(
    documents: StructuredDocument[],
    options: IngestionOptions,
  ): Promise<IngestionResult>;
}

// Retrieve

export interface RetrievalRequest {
  query: string;
  weights: RetrievalWeights;
  topK: number;
  collection: string;
}

export interface RetrievalHit {
  chunkId: string;
  url: string;
  title: string;
  content: string;
  score: number;
  sources: string[];
}

export interface Retriever {
  retrieve(request: RetrievalRequest): Promise<RetrievalHit[]>;
}

// Synthesize

export interface AnswerSynthesizer {
  synthesize(query: string, hits: RetrievalHit[]): Promise<string>;
}

// Backends

export interface GraphBackend {
  isReachable(): Promise<boolean>;
}

export interface VectorStoreHealth {
  healthCheck(): Promise<boolean>;
}

// Post-processing

export interface PostProcessContext {
  url: string;
  collection: string;
  artifactDir: string;
}

export interface PostProcessResult {
  artifacts: string[];
}

export interface PostProcessor {
  readonly name: string;
  process(
    documents: StructuredDocument[],
    context: PostProcessContext,
  ): Promise<PostProcessResult>;
}

// Artifacts

export interface ArtifactWriter {
  /**
   * Writes one document as JSON under `dir`; resolves to the file path.
   * Names already in `taken` get a numeric suffix, and the chosen name is
   * added to it, so one run never writes the same file twice.
   */
  writeDocument(
    dir: string,
    document: StructuredDocument,
    taken?: Set<string>,
  ): Promise<string>;
  writeJson(dir: string, fileName: string, payload: unknown): Promise<string>;
}
