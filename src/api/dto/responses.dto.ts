/**
 * Wire shapes returned by the HTTP and TCP boundaries. Field names are
 * snake_case; internal types stay camelCase.
 */

import type { IngestJob, JobStatus } from '../../jobs/job.types';
import type {
  HealthReport,
  QueryAnswer,
} from '../../orchestrator/orchestrator.types';
import type { RetrievalWeights } from '../../weights/weights.types';

export interface IngestAcceptedDto {
  job_id: string;
  status: 'pending';
  url: string;
}

export interface IngestJobDto {
  job_id: string;
  status: JobStatus;
  url: string;
  created_at: string;
  started_at?: string;
  finished_at?: string;
  chunks_ingested?: number;
  failed?: string[];
  error?: string;
}

export interface QuerySourceDto {
  url: string;
  title: string;
  score: number;
}

export interface QueryResponseDto {
  answer: string;
  num_results: number;
  sources: QuerySourceDto[];
  weights: RetrievalWeights;
  synthesized: boolean;
  warnings: string[];
}

export interface HealthResponseDto {
  status: HealthReport['status'];
  graph: boolean;
  vector_store: boolean;
  jobs: number;
}

function isoTime(epochMs: number): string {
  return new Date(epochMs).toISOString();
}

export function toIngestJobDto(job: IngestJob): IngestJobDto {
  const dto: IngestJobDto = {
    job_id: job.id,
    status: job.status,
    url: job.url,
    created_at: isoTime(job.createdAt),
  };
  if (job.startedAt !== null) {
    dto.started_at = isoTime(job.startedAt);
  }
  if (job.finishedAt !== null) {
    dto.finished_at = isoTime(job.finishedAt);
    dto.failed = [...job.failed];
  }
  if (job.chunksIngested !== null) {
    dto.chunks_ingested = job.chunksIngested;
  }
  if (job.error !== null) {
    dto.error = job.error;
  }
  return dto;
}

export function toQueryResponseDto(answer: QueryAnswer): QueryResponseDto {
  return {
    answer: answer.answer,
    num_results: answer.results.length,
    sources: answer.results.map((hit) => ({
      url: hit.url,
      title: hit.title,
      score: hit.score,
    })),
    weights: answer.weights,
    synthesized: answer.synthesized,
    warnings: answer.warnings,
  };
}

export function toHealthResponseDto(report: HealthReport): HealthResponseDto {
  return {
    status: report.status,
    graph: report.graph,
    vector_store: report.vectorStore,
    jobs: report.jobs,
  };
}
