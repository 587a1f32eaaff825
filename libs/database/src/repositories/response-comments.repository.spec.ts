import { Test, TestingModule } from '@nestjs/testing';
import {
  AnalysisStatus,
  CommentCategory,
  ImportanceLevel,
  QuestionType,
  SentimentLabel,
} from '@app/shared-types';
import {
  createMockDrizzleQueryBuilder,
  MockDrizzleQueryBuilder,
} from '@app/testing';
import type { NewResponseComment } from '../schema';
import {
  COMMENT_INSERT_CHUNK_SIZE,
  ResponseCommentsRepository,
} from './response-comments.repository';
import { DatabaseService } from '../database.service';

describe('ResponseCommentsRepository', () => {
  let repository: ResponseCommentsRepository;
  let db: MockDrizzleQueryBuilder;

  beforeEach(async () => {
    db = createMockDrizzleQueryBuilder();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ResponseCommentsRepository,
        {
          provide: DatabaseService,
          useValue: { db: db as unknown as DatabaseService['db'] },
        },
      ],
    }).compile();

    repository = module.get<ResponseCommentsRepository>(
      ResponseCommentsRepository,
    );
  });

  it('should not touch the database for an empty insert', async () => {
    await expect(repository.createMany([])).resolves.toEqual([]);
    expect(db.insert).not.toHaveBeenCalled();
  });

  it('should split large inserts into chunks within one transaction', async () => {
    const rows: NewResponseComment[] = Array.from(
      { length: COMMENT_INSERT_CHUNK_SIZE * 2 + 1 },
      (_, index) => ({
        batchId: 'batch-1',
        questionLabel: 'comment_free',
        questionType: QuestionType.FREE_COMMENT,
        commentText: `comment ${index}`,
        category: CommentCategory.OTHER,
        sentiment: SentimentLabel.NEUTRAL,
        importanceLevel: ImportanceLevel.LOW,
        importanceScore: 0,
        riskLevel: 'low',
        isSafe: true,
        isImprovementNeeded: false,
        analysisStatus: AnalysisStatus.SKIPPED,
        analysisVersion: 'v1',
      }),
    );
    db.resolveWith([{ id: 'c' }]);

    const created = await repository.createMany(rows);

    expect(db.transaction).toHaveBeenCalledTimes(1);
    expect(db.insert).toHaveBeenCalledTimes(3);
    expect(db.values.mock.calls.map(([chunk]) => chunk.length)).toEqual([
      COMMENT_INSERT_CHUNK_SIZE,
      COMMENT_INSERT_CHUNK_SIZE,
      1,
    ]);
    expect(db.values.mock.calls[2][0][0].commentText).toBe(
      `comment ${COMMENT_INSERT_CHUNK_SIZE * 2}`,
    );
    expect(created).toHaveLength(3);
  });

  it('should page through joined comment rows', async () => {
    const comment = { id: 'c-1', batchId: 'batch-1' };
    db.resolveWith([{ comment }]);

    const rows = await repository.findPage({
      courseName: 'Data Science',
      sentiment: SentimentLabel.NEGATIVE,
      limit: 20,
      skip: 40,
    });

    expect(rows).toEqual([comment]);
    expect(db.innerJoin).toHaveBeenCalledTimes(1);
    expect(db.limit).toHaveBeenCalledWith(20);
    expect(db.offset).toHaveBeenCalledWith(40);
  });

  it('should return the count for a batch', async () => {
    db.resolveWith([{ count: 7 }]);

    await expect(repository.countByBatchId('batch-1')).resolves.toBe(7);
  });

  it('should return 0 when the count query yields no row', async () => {
    db.resolveWith([]);

    await expect(repository.countByBatchId('batch-1')).resolves.toBe(0);
  });

  it('should report how many rows were deleted', async () => {
    db.resolveWith([{ id: 'a' }, { id: 'b' }]);

    await expect(repository.deleteByBatchId('batch-1')).resolves.toBe(2);
  });
});
