import {
  Inject,
  Injectable,
  Logger,
  OnApplicationShutdown,
} from '@nestjs/common';
import pLimit from 'p-limit';

export const BACKGROUND_RUNNER_OPTIONS = Symbol('BACKGROUND_RUNNER_OPTIONS');

export interface BackgroundRunnerOptions {
  /** Maximum tasks running at once; 0 means unbounded. */
  concurrency: number;
}

type Limit = ReturnType<typeof pLimit>;

/**
 * Fire-and-forget task primitive for background ingest. Tasks report their
 * outcome through the job store, never to the submitter, so a rejected task
 * is logged here and goes no further.
 */
@Injectable()
export class BackgroundTaskRunner implements OnApplicationShutdown {
  private readonly logger = new Logger(BackgroundTaskRunner.name);
  private readonly limit: Limit;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(
    @Inject(BACKGROUND_RUNNER_OPTIONS) options: BackgroundRunnerOptions,
  ) {
    const concurrency =
      options.concurrency > 0 ? Math.floor(options.concurrency) : Infinity;
    this.limit = pLimit(concurrency);
  }

  submit(label: string, task: () => Promise<void>): void {
    const tracked = this.limit(task).catch((error: unknown) => {
      this.logger.error(
        `Background task ${label} failed`,
        error instanceof Error ? error.stack : String(error),
      );
    });
    this.inFlight.add(tracked);
    void tracked.finally(() => this.inFlight.delete(tracked));
  }

  get pending(): number {
    return this.inFlight.size;
  }

  /** Resolves once every task submitted so far has settled. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  async onApplicationShutdown(): Promise<void> {
    if (this.inFlight.size > 0) {
      this.logger.log(`Waiting for ${this.inFlight.size} background task(s)`);
    }
    await this.drain();
  }
}
