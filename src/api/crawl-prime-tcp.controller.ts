/**
 * CrawlPrime TCP Controller
 * Inter-service access to the same operations as the HTTP controller.
 *
 * TCP Endpoints:
 * 1. ingest_url - Start a background ingest job
 * 2. get_ingest_job - Read a job snapshot
 * 3. query_web - Answer a question over ingested content
 * 4. get_crawlprime_health - Health check for service discovery
 *
 * Every handler answers `{ success, ... }` and never throws across the
 * transport.
 */

import { Controller, Logger } from '@nestjs/common';
import { MessagePattern, Payload } from '@nestjs/microservices';
import { errorMessage } from '../common/errors/crawl-prime.errors';
import { OrchestratorService } from '../orchestrator/orchestrator.service';
import { IngestRequestDto } from './dto/ingest-request.dto';
import { QueryRequestDto } from './dto/query-request.dto';
import {
  toHealthResponseDto,
  toIngestJobDto,
  toQueryResponseDto,
  type HealthResponseDto,
  type IngestJobDto,
  type QueryResponseDto,
} from './dto/responses.dto';
import { validatePayload } from './dto/validate-payload';

interface GetIngestJobRequest {
  job_id?: unknown;
}

type TcpResponse<T> =
  | ({ success: true } & T)
  | { success: false; error: string };

@Controller()
export class CrawlPrimeTcpController {
  private readonly logger = new Logger(CrawlPrimeTcpController.name);

  constructor(private readonly orchestrator: OrchestratorService) {}

  @MessagePattern({ cmd: 'ingest_url' })
  ingestUrl(
    @Payload() payload: object | undefined,
  ): TcpResponse<{ job_id: string; status: 'pending'; url: string }> {
    try {
      const request = validatePayload(IngestRequestDto, payload);
      const url = request.url;
      const jobId = this.orchestrator.ingestAsync(url, {
        collection: request.collection,
        crawlMode: request.crawl_mode,
        maxPages: request.max_pages,
      });
      this.logger.log(`TCP ingest_url accepted job_id=${jobId} url=${url}`);
      return { success: true, job_id: jobId, status: 'pending', url };
    } catch (error: unknown) {
      return this.failure('ingest_url', error);
    }
  }

  @MessagePattern({ cmd: 'get_ingest_job' })
  getIngestJob(
    @Payload() payload: GetIngestJobRequest | undefined,
  ): TcpResponse<{ job: IngestJobDto }> {
    const jobId = typeof payload?.job_id === 'string' ? payload.job_id : '';
    const job = this.orchestrator.getJob(jobId);
    if (!job) {
      return { success: false, error: `Job '${jobId}' not found` };
    }
    return { success: true, job: toIngestJobDto(job) };
  }

  @MessagePattern({ cmd: 'query_web' })
  async queryWeb(
    @Payload() payload: object | undefined,
  ): Promise<TcpResponse<QueryResponseDto>> {
    try {
      const request = validatePayload(QueryRequestDto, payload);
      const answer = await this.orchestrator.query(request.query, {
        collection: request.collection,
        topK: request.top_k,
      });
      return { success: true, ...toQueryResponseDto(answer) };
    } catch (error: unknown) {
      return this.failure('query_web', error);
    }
  }

  @MessagePattern({ cmd: 'get_crawlprime_health' })
  async getHealth(): Promise<TcpResponse<HealthResponseDto>> {
    try {
      const report = await this.orchestrator.health();
      return { success: true, ...toHealthResponseDto(report) };
    } catch (error: unknown) {
      return this.failure('get_crawlprime_health', error);
    }
  }

  private failure(
    pattern: string,
    error: unknown,
  ): { success: false; error: string } {
    this.logger.error(
      `TCP ${pattern} failed: ${errorMessage(error)}`,
      error instanceof Error ? error.stack : undefined,
    );
    return { success: false, error: errorMessage(error) };
  }
}
