import { Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import {
  CRAWL_PRIME_OPTIONS,
  type CrawlPrimeOptions,
} from '../config/crawl-prime.options';
import {
  BACKGROUND_RUNNER_OPTIONS,
  BackgroundTaskRunner,
  type BackgroundRunnerOptions,
} from './background-task.runner';
import { JobStoreService } from './job-store.service';
import {
  JOB_SWEEPER_OPTIONS,
  JobSweeperService,
  type JobSweeperOptions,
} from './job-sweeper.service';
import { JOB_STORE_OPTIONS, type JobStoreOptions } from './job.types';

@Module({
  imports: [ScheduleModule.forRoot()],
  providers: [
    {
      provide: JOB_STORE_OPTIONS,
      useFactory: (options: CrawlPrimeOptions): JobStoreOptions => ({
        retentionMs: options.jobs.retentionMs,
      }),
      inject: [CRAWL_PRIME_OPTIONS],
    },
    {
      provide: JOB_SWEEPER_OPTIONS,
      useFactory: (options: CrawlPrimeOptions): JobSweeperOptions => ({
        intervalMs: options.jobs.sweepIntervalMs,
      }),
      inject: [CRAWL_PRIME_OPTIONS],
    },
    {
      provide: BACKGROUND_RUNNER_OPTIONS,
      useFactory: (options: CrawlPrimeOptions): BackgroundRunnerOptions => ({
        concurrency: options.jobs.concurrency,
      }),
      inject: [CRAWL_PRIME_OPTIONS],
    },
    JobStoreService,
    JobSweeperService,
    BackgroundTaskRunner,
  ],
  exports: [JobStoreService, JobSweeperService, BackgroundTaskRunner],
})
export class JobsModule {}
