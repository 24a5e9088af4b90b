/**
 * Orchestrator Service
 * Entry point for every boundary (HTTP, TCP, CLI). Validates input before
 * any collaborator runs, executes ingest plans inline or as background jobs
 * and drives the query workflow.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  CRAWL_PRIME_OPTIONS,
  type CrawlPrimeOptions,
} from '../config/crawl-prime.options';
import {
  CollaboratorUnavailableError,
  errorMessage,
  ValidationError,
} from '../common/errors/crawl-prime.errors';
import {
  VECTOR_STORE_HEALTH,
  type VectorStoreHealth,
} from '../collaborators/collaborator.interfaces';
import { BackgroundTaskRunner } from '../jobs/background-task.runner';
import { JobStoreService } from '../jobs/job-store.service';
import type { IngestJob } from '../jobs/job.types';
import { detectUrl } from '../planning/plan-builder';
import { GraphReachabilityService } from '../weights/graph-reachability.service';
import { PlanExecutorService } from './plan-executor.service';
import type {
  HealthReport,
  IngestOptions,
  IngestReport,
  QueryAnswer,
  QueryOptions,
} from './orchestrator.types';
import { QueryWorkflowService } from './workflow/query-workflow.service';

@Injectable()
export class OrchestratorService {
  private readonly logger = new Logger(OrchestratorService.name);

  constructor(
    @Inject(CRAWL_PRIME_OPTIONS) private readonly options: CrawlPrimeOptions,
    private readonly planExecutor: PlanExecutorService,
    private readonly queryWorkflow: QueryWorkflowService,
    private readonly jobStore: JobStoreService,
    private readonly taskRunner: BackgroundTaskRunner,
    private readonly reachability: GraphReachabilityService,
    @Inject(VECTOR_STORE_HEALTH)
    private readonly vectorStore: VectorStoreHealth,
  ) {}

  async ingest(url: string, options: IngestOptions = {}): Promise<IngestReport> {
    return this.planExecutor.run(url, options);
  }

  /**
   * Validates `url` and returns a job id at once; the plan runs in the
   * background and reports through the job store.
   */
  ingestAsync(url: string, options: IngestOptions = {}): string {
    const steps = this.planExecutor.plan(url, options);
    const jobId = this.jobStore.create(url.trim());

    this.taskRunner.submit(`ingest ${jobId}`, async () => {
      this.jobStore.update(jobId, { status: 'running' });
      try {
        const report = await this.planExecutor.execute(
          url.trim(),
          steps,
          options.artifactDir,
        );
        this.jobStore.update(jobId, {
          status: 'done',
          chunksIngested: report.chunksIngested,
          failed: report.failed,
        });
      } catch (error) {
        this.logger.error(
          `[IngestJob] failed job_id=${jobId} error=${errorMessage(error)}`,
        );
        this.jobStore.update(jobId, {
          status: 'error',
          error: errorMessage(error),
          failed:
            error instanceof CollaboratorUnavailableError ? error.failed : [],
        });
      }
    });

    return jobId;
  }

  getJob(jobId: string): IngestJob | null {
    return this.jobStore.get(jobId);
  }

  async query(text: string, options: QueryOptions = {}): Promise<QueryAnswer> {
    const query = text.trim();
    if (query.length === 0) {
      throw new ValidationError('Query must not be empty');
    }
    const topK = options.topK ?? this.options.query.topK;
    if (!Number.isInteger(topK) || topK < 1) {
      throw new ValidationError(`top_k must be a positive integer, got ${topK}`);
    }

    return this.queryWorkflow.run({
      query,
      collection: options.collection ?? this.options.collection,
      topK,
      linkedUrl: this.options.query.autoIngestLinkedUrls
        ? detectUrl(query)
        : null,
    });
  }

  async health(): Promise<HealthReport> {
    const [graph, vectorStore] = await Promise.all([
      this.reachability.isReachable(),
      this.vectorStore.healthCheck().catch((error: unknown) => {
        this.logger.warn(`[Health] vector store error=${errorMessage(error)}`);
        return false;
      }),
    ]);
    const graphOk = graph || !this.options.graph.enabled;

    return {
      status: vectorStore && graphOk ? 'ok' : 'degraded',
      graph,
      vectorStore,
      jobs: this.jobStore.size(),
    };
  }
}
