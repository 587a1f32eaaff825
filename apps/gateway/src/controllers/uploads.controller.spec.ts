import { Test, TestingModule } from '@nestjs/testing';
import { BatchStatus, BatchType, SentimentLabel } from '@app/shared-types';
import { BatchStatusDto } from '../dtos';
import { UploadsService } from '../services/uploads.service';
import { UploadsController } from './uploads.controller';

describe('UploadsController', () => {
  let controller: UploadsController;
  let mockUploadsService: jest.Mocked<
    Pick<
      UploadsService,
      | 'upload'
      | 'listBatches'
      | 'getStatus'
      | 'deleteBatch'
      | 'getSummary'
      | 'requestRecompute'
      | 'listBatchComments'
    >
  >;

  const batchId = '123e4567-e89b-12d3-a456-426614174000';

  const mockStatus: BatchStatusDto = {
    file_id: batchId,
    status: BatchStatus.QUEUED,
    course_name: 'Data Science',
    lecture_date: '2024-05-01',
    lecture_number: 1,
    batch_type: BatchType.PRELIMINARY,
    total_responses: 0,
    total_comments: 0,
    processed_comments: 0,
    error_message: null,
    uploaded_at: new Date('2024-05-01T09:00:00Z'),
    processing_started_at: null,
    completed_at: null,
  };

  beforeEach(async () => {
    mockUploadsService = {
      upload: jest.fn().mockResolvedValue({
        file_id: batchId,
        status_url: `/api/uploads/${batchId}/status`,
        message: 'Upload accepted; analysis has been queued.',
      }),
      listBatches: jest.fn().mockResolvedValue([mockStatus]),
      getStatus: jest.fn().mockResolvedValue(mockStatus),
      deleteBatch: jest.fn().mockResolvedValue(undefined),
      getSummary: jest.fn().mockResolvedValue({
        file_id: batchId,
        student_attribute: 'ALL',
        survey: null,
        comments: { sentiment: {}, category: {}, importance: {} },
      }),
      requestRecompute: jest.fn().mockResolvedValue({
        file_id: batchId,
        message: 'Summary recomputation has been queued.',
      }),
      listBatchComments: jest.fn().mockResolvedValue([]),
    };

    const module: TestingModule = await Test.createTestingModule({
      controllers: [UploadsController],
      providers: [{ provide: UploadsService, useValue: mockUploadsService }],
    }).compile();

    controller = module.get<UploadsController>(UploadsController);
  });

  describe('POST /api/uploads', () => {
    const file = {
      originalname: 'survey.csv',
      buffer: Buffer.from('a\n1\n'),
      size: 4,
    };
    const metadata = {
      courseName: 'Data Science',
      lectureDate: '2024-05-01',
      lectureNumber: 1,
    };

    it('should pass file, metadata, uploader and correlation id to the service', async () => {
      const result = await controller.upload(file, metadata, 'instructor-1', 'corr-1');

      expect(result.file_id).toBe(batchId);
      expect(mockUploadsService.upload).toHaveBeenCalledWith(
        file,
        metadata,
        'instructor-1',
        'corr-1',
      );
    });

    it('should record a missing uploader as null', async () => {
      await controller.upload(file, metadata, undefined, 'corr-1');

      expect(mockUploadsService.upload).toHaveBeenCalledWith(
        file,
        metadata,
        null,
        'corr-1',
      );
    });
  });

  describe('GET /api/uploads', () => {
    it('should return every batch', async () => {
      await expect(controller.list()).resolves.toEqual([mockStatus]);
    });
  });

  describe('GET /api/uploads/:id/status', () => {
    it('should return the batch status', async () => {
      await expect(controller.getStatus(batchId)).resolves.toEqual(mockStatus);
      expect(mockUploadsService.getStatus).toHaveBeenCalledWith(batchId);
    });
  });

  describe('DELETE /api/uploads/:id', () => {
    it('should delete through the service', async () => {
      await controller.remove(batchId, 'corr-1');

      expect(mockUploadsService.deleteBatch).toHaveBeenCalledWith(batchId, 'corr-1');
    });
  });

  describe('GET /api/uploads/:id/summary', () => {
    it('should return the ALL summary', async () => {
      const summary = await controller.getSummary(batchId);

      expect(summary.student_attribute).toBe('ALL');
      expect(mockUploadsService.getSummary).toHaveBeenCalledWith(batchId);
    });
  });

  describe('GET /api/uploads/:id/comments', () => {
    it('should pass the paging and filters to the service', async () => {
      const query = { limit: 20, skip: 40, sentiment: SentimentLabel.NEGATIVE };

      await expect(controller.listComments(batchId, query)).resolves.toEqual([]);
      expect(mockUploadsService.listBatchComments).toHaveBeenCalledWith(
        batchId,
        query,
      );
    });
  });

  describe('POST /api/uploads/:id/summary/recompute', () => {
    it('should queue a recompute', async () => {
      const result = await controller.recompute(batchId, 'corr-2');

      expect(result.message).toBe('Summary recomputation has been queued.');
      expect(mockUploadsService.requestRecompute).toHaveBeenCalledWith(
        batchId,
        'corr-2',
      );
    });
  });
});
