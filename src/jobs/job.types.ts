export type JobStatus = 'pending' | 'running' | 'done' | 'error';

export type TerminalJobStatus = Extract<JobStatus, 'done' | 'error'>;

export interface IngestJob {
  readonly id: string;
  readonly url: string;
  readonly status: JobStatus;
  readonly createdAt: number;
  readonly startedAt: number | null;
  readonly finishedAt: number | null;
  /** Set only once the job is `done`. */
  readonly chunksIngested: number | null;
  readonly failed: readonly string[];
  /** Set only once the job is `error`. */
  readonly error: string | null;
}

export type JobUpdate =
  | { status: 'running' }
  | { status: 'done'; chunksIngested: number; failed: readonly string[] }
  | { status: 'error'; error: string; failed?: readonly string[] };

export const JOB_STORE_OPTIONS = Symbol('JOB_STORE_OPTIONS');

export interface JobStoreOptions {
  retentionMs: number;
  clock?: () => number;
  generateId?: () => string;
}

export function isTerminalStatus(
  status: JobStatus,
): status is TerminalJobStatus {
  return status === 'done' || status === 'error';
}
