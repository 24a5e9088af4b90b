/**
 * CrawlPrime HTTP Controller
 *
 * POST /ingest          → 202 { job_id, status, url }
 * GET  /ingest/:jobId   → job snapshot, 404 once unknown or evicted
 * POST /query           → answer with effective weights
 * GET  /health          → backend reachability and job count
 *
 * Bodies are validated by the global ValidationPipe; taxonomy errors are
 * mapped to status codes by CrawlPrimeExceptionFilter.
 */

import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Param,
  Post,
} from '@nestjs/common';
import { JobNotFoundError } from '../common/errors/crawl-prime.errors';
import { OrchestratorService } from '../orchestrator/orchestrator.service';
import { IngestRequestDto } from './dto/ingest-request.dto';
import { QueryRequestDto } from './dto/query-request.dto';
import {
  toHealthResponseDto,
  toIngestJobDto,
  toQueryResponseDto,
  type HealthResponseDto,
  type IngestAcceptedDto,
  type IngestJobDto,
  type QueryResponseDto,
} from './dto/responses.dto';

@Controller()
export class CrawlPrimeController {
  private readonly logger = new Logger(CrawlPrimeController.name);

  constructor(private readonly orchestrator: OrchestratorService) {}

  @Post('ingest')
  @HttpCode(HttpStatus.ACCEPTED)
  ingest(@Body() body: IngestRequestDto): IngestAcceptedDto {
    const jobId = this.orchestrator.ingestAsync(body.url, {
      collection: body.collection,
      crawlMode: body.crawl_mode,
      maxPages: body.max_pages,
    });
    this.logger.log(`Ingest accepted job_id=${jobId} url=${body.url}`);
    return { job_id: jobId, status: 'pending', url: body.url };
  }

  @Get('ingest/:jobId')
  getJob(@Param('jobId') jobId: string): IngestJobDto {
    const job = this.orchestrator.getJob(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }
    return toIngestJobDto(job);
  }

  @Post('query')
  @HttpCode(HttpStatus.OK)
  async query(@Body() body: QueryRequestDto): Promise<QueryResponseDto> {
    const answer = await this.orchestrator.query(body.query, {
      collection: body.collection,
      topK: body.top_k,
    });
    return toQueryResponseDto(answer);
  }

  @Get('health')
  async health(): Promise<HealthResponseDto> {
    return toHealthResponseDto(await this.orchestrator.health());
  }
}
