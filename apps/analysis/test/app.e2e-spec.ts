import { INestApplication } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { TestingModule } from '@nestjs/testing';
import request from 'supertest';
import { App } from 'supertest/types';
import {
  ALL_STUDENTS,
  BatchStatus,
  BatchType,
  MESSAGE_PATTERNS,
} from '@app/shared-types';
import { LlmClientService } from '@app/llm';
import {
  assertMessageAcked,
  createMockRabbitMqContext,
  createTestingModule,
  TestingModuleMocks,
} from '@app/testing';
import { AnalysisController } from '@app/analysis/analysis.controller';
import { CommentClassifierService } from '@app/analysis/classification';
import { HealthController } from '@app/analysis/health/health.controller';
import { JobRunnerService } from '@app/analysis/jobs';
import { UploadPipelineService } from '@app/analysis/pipeline';
import { SummaryAggregatorService } from '@app/analysis/summary';
import { buildSurveyCsv, buildThreeRowSurvey } from '../../../test/fixtures';

const WORKER_PROVIDERS = [
  JobRunnerService,
  UploadPipelineService,
  SummaryAggregatorService,
  CommentClassifierService,
  LlmClientService,
];

describe('Analysis worker (e2e)', () => {
  let mocks: TestingModuleMocks;
  let controller: AnalysisController;

  beforeEach(async () => {
    const compiled = await createTestingModule({
      controllers: [AnalysisController],
      providers: WORKER_PROVIDERS,
      configOverrides: { LLM_PROVIDER: 'mock', JOB_RETRY_DELAY_MS: 0 },
      compile: true,
    });
    mocks = compiled.mocks;
    controller = compiled.module.get(AnalysisController);
  });

  const queueBatch = async (content: Buffer) => {
    const storageUri = await mocks.storage.save(
      'statistics/2024-05-01-lecture-1/survey.csv',
      content,
    );
    return mocks.repositories.batches.create({
      courseName: 'Statistics',
      lectureDate: '2024-05-01',
      lectureNumber: 1,
      batchType: BatchType.PRELIMINARY,
      originalFilename: 'survey.csv',
      storageUri,
      uploadedBy: null,
    });
  };

  it('should process an upload.process message to COMPLETED', async () => {
    const batch = await queueBatch(buildThreeRowSurvey());
    expect(batch.status).toBe(BatchStatus.QUEUED);

    const payload = { batchId: batch.id, storageUri: batch.storageUri, timestamp: new Date() };
    const rmq = createMockRabbitMqContext({
      pattern: MESSAGE_PATTERNS.UPLOAD_PROCESS,
      payload,
      correlationId: 'e2e-1',
    });

    await controller.handleUploadProcess(payload, rmq.context);

    assertMessageAcked(rmq);
    const stored = await mocks.repositories.batches.findById(batch.id);
    expect(stored).toMatchObject({
      status: BatchStatus.COMPLETED,
      totalComments: 3,
      processedComments: 3,
      totalResponses: 3,
    });
    expect(await mocks.repositories.comments.countByBatchId(batch.id)).toBe(3);
    expect(
      await mocks.repositories.summaries.findSurveySummary(batch.id, ALL_STUDENTS),
    ).toMatchObject({ responseCount: 3, commentsCount: 3 });
  });

  it('should record FAILED and ack for an invalid file', async () => {
    const batch = await queueBatch(buildSurveyCsv(['name', 'score'], [['a', '1']]));
    const payload = { batchId: batch.id, storageUri: batch.storageUri, timestamp: new Date() };
    const rmq = createMockRabbitMqContext({
      pattern: MESSAGE_PATTERNS.UPLOAD_PROCESS,
      payload,
    });

    await controller.handleUploadProcess(payload, rmq.context);

    assertMessageAcked(rmq);
    const stored = await mocks.repositories.batches.findById(batch.id);
    expect(stored?.status).toBe(BatchStatus.FAILED);
    expect(stored?.errorMessage).toContain('File must contain at least one column');
  });

  it('should recompute summaries on summary.recompute', async () => {
    const batch = await queueBatch(buildThreeRowSurvey());
    const uploadPayload = { batchId: batch.id, storageUri: batch.storageUri, timestamp: new Date() };
    await controller.handleUploadProcess(
      uploadPayload,
      createMockRabbitMqContext({ payload: uploadPayload }).context,
    );
    mocks.repositories.store.surveySummaries.clear();

    const payload = { batchId: batch.id, timestamp: new Date() };
    const rmq = createMockRabbitMqContext({
      pattern: MESSAGE_PATTERNS.SUMMARY_RECOMPUTE,
      payload,
    });
    await controller.handleSummaryRecompute(payload, rmq.context);

    assertMessageAcked(rmq);
    expect(mocks.repositories.store.surveySummaries.size).toBe(3);
  });
});

describe('Analysis health (e2e)', () => {
  let app: INestApplication;
  let mocks: TestingModuleMocks;

  beforeEach(async () => {
    const created = createTestingModule({
      imports: [TerminusModule],
      controllers: [HealthController],
      configOverrides: { HEALTH_HEAP_LIMIT_MB: 4096, HEALTH_RSS_LIMIT_MB: 4096 },
    });
    mocks = created.mocks;
    const moduleFixture: TestingModule = await created.builder.compile();
    app = moduleFixture.createNestApplication();
    await app.init();
  });

  afterEach(async () => {
    await app.close();
  });

  it('/health (GET)', () => {
    return request(app.getHttpServer() as App)
      .get('/health')
      .expect(200)
      .expect((res) => {
        expect(res.body).toHaveProperty('status', 'ok');
        expect(res.body).toHaveProperty('details.memory_heap.status', 'up');
      });
  });

  it('/health/ready (GET) - should return ready when the database answers', () => {
    return request(app.getHttpServer() as App)
      .get('/health/ready')
      .expect(200)
      .expect((res) => {
        expect(res.body).toHaveProperty('status', 'ready');
        expect(res.body).toHaveProperty('checks.database', 'connected');
      });
  });

  it('/health/ready (GET) - should return 503 when the database is down', () => {
    mocks.database.healthCheck.mockResolvedValue(false);

    return request(app.getHttpServer() as App)
      .get('/health/ready')
      .expect(503)
      .expect((res) => {
        expect(res.body).toHaveProperty('status', 'not_ready');
      });
  });
});
