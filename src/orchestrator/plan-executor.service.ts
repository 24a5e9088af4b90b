/**
 * Plan Executor Service
 * Runs an ingest plan step by step against the stage collaborators.
 *
 * Per-resource problems (one page that would not load, one document that
 * could not be embedded) are collected into the report. A crawler or
 * ingestion pipeline that throws ends the run with
 * CollaboratorUnavailableError. Post-processing never fails a run.
 */

import { join } from 'node:path';
import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import {
  CRAWL_PRIME_OPTIONS,
  type CrawlPrimeOptions,
} from '../config/crawl-prime.options';
import {
  CollaboratorUnavailableError,
  errorMessage,
  toCollaboratorError,
  ValidationError,
} from '../common/errors/crawl-prime.errors';
import {
  ARTIFACT_WRITER,
  CLUSTERER,
  describeFailure,
  HTML_MAPPER,
  INGESTION_PIPELINE,
  SUMMARIZER,
  WEB_CRAWLER,
  type ArtifactWriter,
  type CrawledPage,
  type CrawlResult,
  type HtmlMapper,
  type IngestionPipeline,
  type IngestionResult,
  type PostProcessor,
  type StructuredDocument,
  type SubResourceFailure,
  type WebCrawler,
} from '../collaborators/collaborator.interfaces';
import { buildPlan } from '../planning/plan-builder';
import type {
  ClusterStep,
  CrawlStep,
  IngestStep,
  PlanStep,
  PlanStepKind,
  SummarizeStep,
} from '../planning/plan.types';
import type { IngestOptions, IngestReport } from './orchestrator.types';

interface ExecutionState {
  url: string;
  artifactDir: string | undefined;
  pages: CrawledPage[];
  documents: StructuredDocument[];
  failures: SubResourceFailure[];
  chunksIngested: number;
  steps: PlanStepKind[];
  artifacts: string[];
  artifactNames: Set<string>;
}

@Injectable()
export class PlanExecutorService {
  private readonly logger = new Logger(PlanExecutorService.name);

  constructor(
    @Inject(CRAWL_PRIME_OPTIONS) private readonly options: CrawlPrimeOptions,
    @Inject(WEB_CRAWLER) private readonly crawler: WebCrawler,
    @Inject(HTML_MAPPER) private readonly mapper: HtmlMapper,
    @Inject(INGESTION_PIPELINE) private readonly pipeline: IngestionPipeline,
    @Inject(ARTIFACT_WRITER) private readonly artifactWriter: ArtifactWriter,
    @Optional()
    @Inject(SUMMARIZER)
    private readonly summarizer: PostProcessor | null = null,
    @Optional()
    @Inject(CLUSTERER)
    private readonly clusterer: PostProcessor | null = null,
  ) {}

  /**
   * Builds the plan for `url`. Throws ValidationError for a URL the plan
   * builder rejects, so callers fail before any collaborator runs.
   */
  plan(url: string, options: IngestOptions = {}): PlanStep[] {
    const steps = buildPlan(url, {
      collection: options.collection ?? this.options.collection,
      crawlMode: options.crawlMode,
      maxPages: options.maxPages ?? this.options.crawl.maxPages,
      maxDepth: options.maxDepth ?? this.options.crawl.maxDepth,
      summarize: options.summarize,
      cluster: options.cluster,
      capabilities: {
        summarize: this.summarizer !== null,
        cluster: this.clusterer !== null,
      },
    });
    if (steps.length === 0) {
      throw new ValidationError(
        `Invalid URL '${url}': expected an absolute http(s) URL`,
      );
    }
    return steps;
  }

  async run(url: string, options: IngestOptions = {}): Promise<IngestReport> {
    return this.execute(url, this.plan(url, options), options.artifactDir);
  }

  async execute(
    url: string,
    steps: PlanStep[],
    artifactDir?: string,
  ): Promise<IngestReport> {
    const startTime = Date.now();
    const state: ExecutionState = {
      url,
      artifactDir,
      pages: [],
      documents: [],
      failures: [],
      chunksIngested: 0,
      steps: [],
      artifacts: [],
      artifactNames: new Set<string>(),
    };

    this.logger.log(
      `[Plan] url=${url} steps=${steps.map((step) => step.kind).join(',')}`,
    );

    for (const step of steps) {
      try {
        await this.runStep(step, state);
      } catch (error) {
        // Failures collected so far travel with the fatal error.
        if (
          error instanceof CollaboratorUnavailableError &&
          state.failures.length > 0
        ) {
          throw error.withFailures(state.failures.map(describeFailure));
        }
        throw error;
      }
      state.steps.push(step.kind);
    }

    this.logger.log(
      `[Plan] completed url=${url} pages=${state.pages.length} documents=${state.documents.length} chunks=${state.chunksIngested} failed=${state.failures.length} duration=${Date.now() - startTime}ms`,
    );

    return {
      url,
      chunksIngested: state.chunksIngested,
      failed: state.failures.map(describeFailure),
      pagesCrawled: state.pages.length,
      documentsMapped: state.documents.length,
      steps: state.steps,
      artifacts: state.artifacts,
    };
  }

  private async runStep(step: PlanStep, state: ExecutionState): Promise<void> {
    switch (step.kind) {
      case 'crawl':
        return this.runCrawl(step, state);
      case 'map':
        return this.runMap(state);
      case 'ingest':
        return this.runIngest(step, state);
      case 'summarize':
        return this.runPostProcessor(this.summarizer, step, state);
      case 'cluster':
        return this.runPostProcessor(this.clusterer, step, state);
      default: {
        const unknownStep: never = step;
        throw new Error(`Unhandled plan step: ${JSON.stringify(unknownStep)}`);
      }
    }
  }

  private async runCrawl(step: CrawlStep, state: ExecutionState): Promise<void> {
    let result: CrawlResult;
    try {
      result = await this.crawler.crawl({
        url: step.url,
        mode: step.mode,
        maxPages: step.maxPages,
        maxDepth: step.maxDepth,
      });
    } catch (error) {
      throw toCollaboratorError('crawl', error);
    }

    state.pages.push(...result.pages);
    state.failures.push(...result.failures);

    if (result.pages.length === 0 && result.failures.length > 0) {
      throw new CollaboratorUnavailableError(
        'crawl',
        `no page could be crawled (first failure: ${describeFailure(result.failures[0])})`,
      );
    }
  }

  private async runMap(state: ExecutionState): Promise<void> {
    for (const page of state.pages) {
      let document: StructuredDocument;
      try {
        document = await this.mapper.map(page);
      } catch (error) {
        state.failures.push({
          resource: page.url,
          stage: 'map',
          reason: errorMessage(error),
        });
        continue;
      }
      state.documents.push(document);

      if (state.artifactDir === undefined) {
        continue;
      }
      try {
        state.artifacts.push(
          await this.artifactWriter.writeDocument(
            state.artifactDir,
            document,
            state.artifactNames,
          ),
        );
      } catch (error) {
        state.failures.push({
          resource: page.url,
          stage: 'artifact',
          reason: errorMessage(error),
        });
      }
    }
  }

  private async runIngest(
    step: IngestStep,
    state: ExecutionState,
  ): Promise<void> {
    if (state.documents.length === 0) {
      this.logger.warn(`[Ingest] skipped url=${step.url} reason=no_documents`);
      return;
    }

    let result: IngestionResult;
    try {
      result = await this.pipeline.ingest(state.documents, {
        collection: step.collection,
      });
    } catch (error) {
      throw toCollaboratorError('ingest', error);
    }

    state.chunksIngested += result.chunksIngested;
    state.failures.push(...result.failed);
  }

  private async runPostProcessor(
    processor: PostProcessor | null,
    step: SummarizeStep | ClusterStep,
    state: ExecutionState,
  ): Promise<void> {
    if (!processor || state.documents.length === 0) {
      return;
    }
    try {
      const result = await processor.process(state.documents, {
        url: step.url,
        collection: step.collection,
        artifactDir:
          state.artifactDir ?? join(this.options.storagePath, step.collection),
      });
      state.artifacts.push(...result.artifacts);
    } catch (error) {
      this.logger.warn(
        `[${processor.name}] degraded url=${step.url} error=${errorMessage(error)}`,
      );
    }
  }
}
