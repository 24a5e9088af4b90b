import { Inject, Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import {
  isTerminalStatus,
  JOB_STORE_OPTIONS,
  type IngestJob,
  type JobStatus,
  type JobStoreOptions,
  type JobUpdate,
} from './job.types';

const ALLOWED_TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  pending: ['running'],
  running: ['done', 'error'],
  done: [],
  error: [],
};

/**
 * In-memory registry of ingest jobs. Records are frozen snapshots replaced
 * wholesale on every update, so readers never see a half-applied change.
 * Terminal jobs expire `retentionMs` after `finishedAt`, either lazily on
 * `get` or through `sweep`.
 */
@Injectable()
export class JobStoreService {
  private readonly logger = new Logger(JobStoreService.name);
  private readonly jobs = new Map<string, IngestJob>();
  private readonly clock: () => number;
  private readonly generateId: () => string;

  constructor(
    @Inject(JOB_STORE_OPTIONS) private readonly options: JobStoreOptions,
  ) {
    this.clock = options.clock ?? Date.now;
    this.generateId = options.generateId ?? (() => uuidv4().replace(/-/g, ''));
  }

  get retentionMs(): number {
    return this.options.retentionMs;
  }

  create(url: string): string {
    const id = this.generateId();
    const job: IngestJob = Object.freeze({
      id,
      url,
      status: 'pending',
      createdAt: this.clock(),
      startedAt: null,
      finishedAt: null,
      chunksIngested: null,
      failed: Object.freeze([]),
      error: null,
    });
    this.jobs.set(id, job);
    this.logger.log(`[JobStore] created job=${id} url=${url}`);
    return id;
  }

  /** Unknown and evicted ids both return null. */
  get(jobId: string): IngestJob | null {
    const job = this.jobs.get(jobId);
    if (!job) {
      return null;
    }
    if (this.isExpired(job, this.clock())) {
      this.jobs.delete(jobId);
      return null;
    }
    return job;
  }

  /**
   * Applies a status transition. Anything other than pending→running or
   * running→done|error leaves the record untouched and returns false.
   */
  update(jobId: string, update: JobUpdate): boolean {
    const current = this.get(jobId);
    if (!current) {
      this.logger.warn(
        `[JobStore] ignored ${update.status} for unknown job=${jobId}`,
      );
      return false;
    }

    if (!ALLOWED_TRANSITIONS[current.status].includes(update.status)) {
      this.logger.warn(
        `[JobStore] ignored transition ${current.status}→${update.status} job=${jobId}`,
      );
      return false;
    }

    const now = this.clock();
    let next: IngestJob;
    switch (update.status) {
      case 'running':
        next = { ...current, status: 'running', startedAt: now };
        break;
      case 'done':
        next = {
          ...current,
          status: 'done',
          finishedAt: now,
          chunksIngested: update.chunksIngested,
          failed: Object.freeze([...update.failed]),
        };
        break;
      case 'error':
        next = {
          ...current,
          status: 'error',
          finishedAt: now,
          error: update.error,
          failed: Object.freeze([...(update.failed ?? current.failed)]),
        };
        break;
    }

    this.jobs.set(jobId, Object.freeze(next));
    this.logger.log(`[JobStore] job=${jobId} status=${next.status}`);
    return true;
  }

  /** Removes expired terminal jobs; pending and running jobs are never touched. */
  sweep(now: number = this.clock()): number {
    let removed = 0;
    for (const [id, job] of this.jobs) {
      if (this.isExpired(job, now)) {
        this.jobs.delete(id);
        removed += 1;
      }
    }
    if (removed > 0) {
      this.logger.log(`[JobStore] swept ${removed} expired job(s)`);
    }
    return removed;
  }

  size(): number {
    return this.jobs.size;
  }

  private isExpired(job: IngestJob, now: number): boolean {
    return (
      isTerminalStatus(job.status) &&
      job.finishedAt !== null &&
      now - job.finishedAt > this.options.retentionMs
    );
  }
}
