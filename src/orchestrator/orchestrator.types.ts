import type { RetrievalHit } from '../collaborators/collaborator.interfaces';
import type { CrawlModeOption, PlanStepKind } from '../planning/plan.types';
import type { RetrievalWeights } from '../weights/weights.types';

export interface IngestOptions {
  /** Defaults to the configured collection. */
  collection?: string;
  crawlMode?: CrawlModeOption;
  maxPages?: number;
  maxDepth?: number;
  /** Mapped documents are written here when set. */
  artifactDir?: string;
  summarize?: boolean;
  cluster?: boolean;
}

export interface IngestReport {
  url: string;
  chunksIngested: number;
  /** `"<resource>: <reason>"`, in the order the failures occurred. */
  failed: string[];
  pagesCrawled: number;
  documentsMapped: number;
  steps: PlanStepKind[];
  artifacts: string[];
}

export interface QueryOptions {
  collection?: string;
  topK?: number;
}

export interface QueryAnswer {
  query: string;
  answer: string;
  results: RetrievalHit[];
  weights: RetrievalWeights;
  synthesized: boolean;
  warnings: string[];
}

export interface HealthReport {
  status: 'ok' | 'degraded';
  graph: boolean;
  vectorStore: boolean;
  jobs: number;
}
