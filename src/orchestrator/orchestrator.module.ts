import { Module } from '@nestjs/common';
import { CollaboratorsModule } from '../collaborators/collaborators.module';
import {
  CRAWL_PRIME_OPTIONS,
  type CrawlPrimeOptions,
} from '../config/crawl-prime.options';
import { JobsModule } from '../jobs/jobs.module';
import {
  GRAPH_PROBE_OPTIONS,
  GraphReachabilityService,
  type GraphProbeOptions,
} from '../weights/graph-reachability.service';
import { OrchestratorService } from './orchestrator.service';
import { PlanExecutorService } from './plan-executor.service';
import { QueryWorkflowService } from './workflow/query-workflow.service';

@Module({
  imports: [CollaboratorsModule, JobsModule],
  providers: [
    {
      provide: GRAPH_PROBE_OPTIONS,
      useFactory: (options: CrawlPrimeOptions): GraphProbeOptions => ({
        cacheMs: options.graph.probeCacheMs,
      }),
      inject: [CRAWL_PRIME_OPTIONS],
    },
    GraphReachabilityService,
    PlanExecutorService,
    QueryWorkflowService,
    OrchestratorService,
  ],
  exports: [OrchestratorService],
})
export class OrchestratorModule {}
