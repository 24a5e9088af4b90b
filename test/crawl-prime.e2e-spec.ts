import { INestApplication } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import request from 'supertest';
import { ApiModule } from '../src/api/api.module';
import { configureHttpApp } from '../src/app.setup';
import {
  ANSWER_SYNTHESIZER,
  GRAPH_BACKEND,
  INGESTION_PIPELINE,
  RETRIEVER,
  VECTOR_STORE_HEALTH,
  WEB_CRAWLER,
  type CrawlRequest,
  type CrawlResult,
  type RetrievalHit,
} from '../src/collaborators/collaborator.interfaces';
import { QdrantStoreService } from '../src/collaborators/stores/qdrant-store.service';
import { CrawlPrimeConfigModule } from '../src/config/crawl-prime-config.module';
import { validate } from '../src/config/env.validation';
import { BackgroundTaskRunner } from '../src/jobs/background-task.runner';

const PAGE_HTML = `<html><head><title>Cache Guide</title></head><body>
  <h1>Cache Guide</h1>
  <p>Entries expire one hour after they finish.</p>
</body></html>`;

const hit: RetrievalHit = {
  chunkId: 'c1',
  url: 'https://example.com/guide',
  title: 'Cache Guide',
  content: 'Entries expire one hour after they finish.',
  score: 0.016,
  sources: ['vector', 'lexical'],
};

describe('CrawlPrime HTTP API (e2e)', () => {
  let app: INestApplication;
  let crawl: jest.Mock<Promise<CrawlResult>, [CrawlRequest]>;
  let ingest: jest.Mock;
  let retrieve: jest.Mock;
  let graphReachable: boolean;

  beforeEach(async () => {
    graphReachable = true;
    crawl = jest.fn(
      async (req: CrawlRequest): Promise<CrawlResult> => ({
        pages: [
          {
            url: req.url,
            title: 'Cache Guide',
            html: PAGE_HTML,
            links: [],
            crawledAt: '2024-01-01T00:00:00.000Z',
          },
        ],
        failures: [],
      }),
    );
    ingest = jest.fn().mockResolvedValue({ chunksIngested: 42, failed: [] });
    retrieve = jest.fn().mockResolvedValue([hit]);

    const moduleRef = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({ isGlobal: true, ignoreEnvFile: true, validate }),
        CrawlPrimeConfigModule,
        ApiModule,
      ],
    })
      .overrideProvider(WEB_CRAWLER)
      .useValue({ crawl })
      .overrideProvider(INGESTION_PIPELINE)
      .useValue({ ingest })
      .overrideProvider(RETRIEVER)
      .useValue({ retrieve })
      .overrideProvider(ANSWER_SYNTHESIZER)
      .useValue({
        synthesize: async () => 'Entries expire after one hour [1].',
      })
      .overrideProvider(GRAPH_BACKEND)
      .useValue({ isReachable: async () => graphReachable })
      .overrideProvider(VECTOR_STORE_HEALTH)
      .useValue({ healthCheck: async () => true })
      .overrideProvider(QdrantStoreService)
      .useValue({})
      .compile();

    app = moduleRef.createNestApplication();
    configureHttpApp(app);
    await app.init();
  });

  afterEach(async () => {
    await app.close();
  });

  describe('POST /ingest', () => {
    it('accepts a URL and completes the job in the background', async () => {
      const accepted = await request(app.getHttpServer())
        .post('/ingest')
        .send({ url: 'https://example.com/guide' })
        .expect(202);

      expect(accepted.body).toEqual({
        job_id: expect.stringMatching(/^[0-9a-f]{32}$/),
        status: 'pending',
        url: 'https://example.com/guide',
      });

      await app.get(BackgroundTaskRunner).drain();

      const job = await request(app.getHttpServer())
        .get(`/ingest/${accepted.body.job_id}`)
        .expect(200);

      expect(job.body).toMatchObject({
        job_id: accepted.body.job_id,
        status: 'done',
        url: 'https://example.com/guide',
        chunks_ingested: 42,
        failed: [],
      });
      expect(job.body.error).toBeUndefined();
      expect(ingest).toHaveBeenCalledTimes(1);
      expect(ingest.mock.calls[0][0][0].title).toBe('Cache Guide');
    });

    it.each([
      { url: 'not a url' },
      { url: 'ftp://example.com/file' },
      {},
      { url: 'https://example.com', crawl_mode: 'deep' },
    ])('rejects %j with 400', async (body) => {
      await request(app.getHttpServer()).post('/ingest').send(body).expect(400);
      expect(crawl).not.toHaveBeenCalled();
    });
  });

  describe('GET /ingest/:jobId', () => {
    it('returns 404 for unknown jobs', async () => {
      const response = await request(app.getHttpServer())
        .get('/ingest/unknown')
        .expect(404);

      expect(response.body).toEqual({
        statusCode: 404,
        error: 'JOB_NOT_FOUND',
        message: "Job 'unknown' not found",
      });
    });
  });

  describe('POST /query', () => {
    it('answers with the effective weights', async () => {
      const response = await request(app.getHttpServer())
        .post('/query')
        .send({ query: 'How long do entries live?', top_k: 3 })
        .expect(200);

      expect(response.body).toMatchObject({
        answer: 'Entries expire after one hour [1].',
        num_results: 1,
        sources: [
          { url: 'https://example.com/guide', title: 'Cache Guide', score: 0.016 },
        ],
        synthesized: true,
        warnings: [],
      });
      expect(retrieve).toHaveBeenCalledWith(
        expect.objectContaining({ topK: 3, query: 'How long do entries live?' }),
      );
    });

    it('drops the graph weight while the graph is unreachable', async () => {
      graphReachable = false;

      const response = await request(app.getHttpServer())
        .post('/query')
        .send({ query: 'How long do entries live?' })
        .expect(200);

      expect(response.body.weights.graph).toBe(0);
      expect(response.body.weights.vector).toBeCloseTo(0.857, 3);
      expect(response.body.weights.lexical).toBeCloseTo(0.143, 3);
    });

    it('rejects an empty query with 400', async () => {
      await request(app.getHttpServer())
        .post('/query')
        .send({ query: '' })
        .expect(400);
      expect(retrieve).not.toHaveBeenCalled();
    });

    it('rejects a blank query with a validation error', async () => {
      const response = await request(app.getHttpServer())
        .post('/query')
        .send({ query: '   ' })
        .expect(400);

      expect(response.body).toEqual({
        statusCode: 400,
        error: 'VALIDATION_ERROR',
        message: 'Query must not be empty',
      });
    });

    it('returns 503 when retrieval is unavailable', async () => {
      retrieve.mockRejectedValue(new Error('connect ECONNREFUSED'));

      const response = await request(app.getHttpServer())
        .post('/query')
        .send({ query: 'How long do entries live?' })
        .expect(503);

      expect(response.body).toEqual({
        statusCode: 503,
        error: 'COLLABORATOR_UNAVAILABLE',
        message: 'retrieve collaborator unavailable: connect ECONNREFUSED',
      });
    });
  });

  describe('GET /health', () => {
    it('reports backend status', async () => {
      const response = await request(app.getHttpServer())
        .get('/health')
        .expect(200);

      expect(response.body).toEqual({
        status: 'ok',
        graph: true,
        vector_store: true,
        jobs: 0,
      });
    });
  });
});
