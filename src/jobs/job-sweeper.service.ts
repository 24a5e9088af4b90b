/**
 * Job Sweeper Service
 * Periodic TTL eviction of finished ingest jobs.
 *
 * The interval is registered with SchedulerRegistry on bootstrap and removed on
 * shutdown instead of using a decorated @Interval, so it can be started and
 * stopped explicitly and tests can call runSweep() without a timer.
 */

import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnApplicationShutdown,
} from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import { JobStoreService } from './job-store.service';

export const JOB_SWEEPER_OPTIONS = Symbol('JOB_SWEEPER_OPTIONS');

export interface JobSweeperOptions {
  intervalMs: number;
}

export const JOB_SWEEP_INTERVAL_NAME = 'ingest-job-sweep';

@Injectable()
export class JobSweeperService
  implements OnApplicationBootstrap, OnApplicationShutdown
{
  private readonly logger = new Logger(JobSweeperService.name);

  constructor(
    private readonly jobStore: JobStoreService,
    private readonly schedulerRegistry: SchedulerRegistry,
    @Inject(JOB_SWEEPER_OPTIONS) private readonly options: JobSweeperOptions,
  ) {}

  onApplicationBootstrap(): void {
    this.start();
  }

  onApplicationShutdown(): void {
    this.stop();
  }

  isRunning(): boolean {
    return this.schedulerRegistry.doesExist('interval', JOB_SWEEP_INTERVAL_NAME);
  }

  start(): void {
    if (this.isRunning()) {
      return;
    }
    const handle = setInterval(() => this.runSweep(), this.options.intervalMs);
    handle.unref();
    this.schedulerRegistry.addInterval(JOB_SWEEP_INTERVAL_NAME, handle);
    this.logger.log(
      `Job sweep scheduled every ${this.options.intervalMs}ms (retention ${this.jobStore.retentionMs}ms)`,
    );
  }

  stop(): void {
    if (!this.isRunning()) {
      return;
    }
    this.schedulerRegistry.deleteInterval(JOB_SWEEP_INTERVAL_NAME);
    this.logger.log('Job sweep stopped');
  }

  runSweep(now?: number): number {
    try {
      return this.jobStore.sweep(now);
    } catch (error) {
      this.logger.error(
        'Job sweep failed',
        error instanceof Error ? error.stack : String(error),
      );
      return 0;
    }
  }
}
