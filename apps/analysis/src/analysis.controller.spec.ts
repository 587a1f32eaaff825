import { Logger } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import {
  BatchNotFoundError,
  JobFailedError,
  MESSAGE_PATTERNS,
  StorageError,
} from '@app/shared-types';
import {
  SurveyBatchFactory,
  assertMessageAcked,
  assertMessageNacked,
  createMockRabbitMqContext,
} from '@app/testing';
import {
  createMockProcessUploadMessage,
  createMockRecomputeSummaryMessage,
} from '../../../test/fixtures';
import { AnalysisController } from './analysis.controller';
import { JobRunnerService } from './jobs';
import { SummaryAggregatorService } from './summary';
import type { ProcessUploadMessage } from '@app/shared-types';

describe('AnalysisController', () => {
  let controller: AnalysisController;
  let jobRunner: { run: jest.Mock };
  let aggregator: { recompute: jest.Mock };

  beforeEach(async () => {
    jobRunner = { run: jest.fn() };
    aggregator = { recompute: jest.fn() };

    const app: TestingModule = await Test.createTestingModule({
      controllers: [AnalysisController],
      providers: [
        { provide: JobRunnerService, useValue: jobRunner },
        { provide: SummaryAggregatorService, useValue: aggregator },
      ],
    }).compile();

    controller = app.get<AnalysisController>(AnalysisController);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('handleUploadProcess', () => {
    const payload = createMockProcessUploadMessage();
    const uploadContext = (correlationId?: string) =>
      createMockRabbitMqContext({
        pattern: MESSAGE_PATTERNS.UPLOAD_PROCESS,
        payload,
        correlationId,
      });

    it('should run the job and ack', async () => {
      jobRunner.run.mockResolvedValue(SurveyBatchFactory.createCompleted());
      const rmq = uploadContext('corr-1');

      await controller.handleUploadProcess(payload, rmq.context);

      expect(jobRunner.run).toHaveBeenCalledWith(payload.batchId, 'corr-1');
      assertMessageAcked(rmq);
    });

    it('should fall back to the batch id as correlation id', async () => {
      jobRunner.run.mockResolvedValue(SurveyBatchFactory.createCompleted());
      const rmq = uploadContext();

      await controller.handleUploadProcess(payload, rmq.context);

      expect(jobRunner.run).toHaveBeenCalledWith(payload.batchId, payload.batchId);
    });

    it('should ack when the job failure was recorded', async () => {
      jobRunner.run.mockRejectedValue(
        new JobFailedError(payload.batchId, 'CSV header row is missing.'),
      );
      const rmq = uploadContext();

      await controller.handleUploadProcess(payload, rmq.context);

      assertMessageAcked(rmq);
    });

    it('should requeue transient errors', async () => {
      const warn = jest.spyOn(Logger.prototype, 'warn');
      jobRunner.run.mockRejectedValue(new StorageError('disk unavailable'));
      const rmq = uploadContext('corr-3');

      await controller.handleUploadProcess(payload, rmq.context);

      assertMessageNacked(rmq, true);
      expect(warn).toHaveBeenCalledWith(
        '[corr-3] Requeuing message for retry (transient failure)',
      );
    });

    it('should requeue unclassified errors', async () => {
      const warn = jest.spyOn(Logger.prototype, 'warn');
      jobRunner.run.mockRejectedValue(new Error('connection terminated'));
      const rmq = uploadContext('corr-4');

      await controller.handleUploadProcess(payload, rmq.context);

      assertMessageNacked(rmq, true);
      expect(warn).toHaveBeenCalledWith(
        '[corr-4] Requeuing message for retry (unclassified failure)',
      );
    });

    it('should discard permanent errors', async () => {
      jobRunner.run.mockRejectedValue(new BatchNotFoundError(payload.batchId));
      const rmq = uploadContext();

      await controller.handleUploadProcess(payload, rmq.context);

      assertMessageNacked(rmq, false);
    });

    it('should ack and skip messages without a batch id', async () => {
      const invalid = { timestamp: new Date() } as unknown as ProcessUploadMessage;
      const rmq = createMockRabbitMqContext({
        pattern: MESSAGE_PATTERNS.UPLOAD_PROCESS,
        payload: invalid,
      });

      await controller.handleUploadProcess(invalid, rmq.context);

      expect(jobRunner.run).not.toHaveBeenCalled();
      assertMessageAcked(rmq);
    });
  });

  describe('handleSummaryRecompute', () => {
    const payload = createMockRecomputeSummaryMessage();

    it('should recompute the batch summaries and ack', async () => {
      aggregator.recompute.mockResolvedValue({
        surveySummaries: [],
        commentSummaries: [],
      });
      const rmq = createMockRabbitMqContext({
        pattern: MESSAGE_PATTERNS.SUMMARY_RECOMPUTE,
        payload,
        correlationId: 'corr-2',
      });

      await controller.handleSummaryRecompute(payload, rmq.context);

      expect(aggregator.recompute).toHaveBeenCalledWith(payload.batchId, 'corr-2');
      assertMessageAcked(rmq);
    });

    it('should requeue when the database is unreachable', async () => {
      aggregator.recompute.mockRejectedValue(new Error('ECONNREFUSED'));
      const rmq = createMockRabbitMqContext({
        pattern: MESSAGE_PATTERNS.SUMMARY_RECOMPUTE,
        payload,
      });

      await controller.handleSummaryRecompute(payload, rmq.context);

      assertMessageNacked(rmq, true);
    });
  });
});
