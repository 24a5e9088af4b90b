export type CrawlMode = 'page' | 'site';

export type CrawlModeOption = CrawlMode | 'auto';

export interface CrawlStep {
  kind: 'crawl';
  url: string;
  mode: CrawlMode;
  maxPages: number;
  maxDepth: number;
}

export interface MapStep {
  kind: 'map';
  url: string;
}

export interface IngestStep {
  kind: 'ingest';
  url: string;
  collection: string;
}

export interface SummarizeStep {
  kind: 'summarize';
  url: string;
  collection: string;
}

export interface ClusterStep {
  kind: 'cluster';
  url: string;
  collection: string;
}

export type PlanStep =
  | CrawlStep
  | MapStep
  | IngestStep
  | SummarizeStep
  | ClusterStep;

export type PlanStepKind = PlanStep['kind'];

/**
 * Which optional post-processors are configured. Resolved once at plan-build
 * time; the builder never inspects the collaborators themselves.
 */
export interface PlanCapabilities {
  summarize: boolean;
  cluster: boolean;
}

export interface PlanOptions {
  collection: string;
  crawlMode?: CrawlModeOption;
  maxPages?: number;
  maxDepth?: number;
  /** Request summarization. Defaults to true; still needs the capability. */
  summarize?: boolean;
  /** Request clustering. Defaults to true; still needs the capability. */
  cluster?: boolean;
  capabilities: PlanCapabilities;
}
