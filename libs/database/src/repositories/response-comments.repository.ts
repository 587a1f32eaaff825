import { Injectable, Logger } from '@nestjs/common';
import { SQL, and, asc, count, eq } from 'drizzle-orm';
import { CommentCategory, SentimentLabel } from '@app/shared-types';
import { DatabaseService } from '../database.service';
import {
  responseComments,
  surveyBatches,
  NewResponseComment,
  ResponseComment,
} from '../schema';

/**
 * Filters and paging for comment listings; batchId and courseName narrow
 * the rows, the label filters are optional
 */
export interface CommentPageQuery {
  batchId?: string;
  courseName?: string;
  sentiment?: SentimentLabel;
  category?: CommentCategory;
  limit: number;
  skip: number;
}

/**
 * Rows per INSERT; each comment binds 18 parameters and PostgreSQL takes at
 * most 65535 in one statement
 */
export const COMMENT_INSERT_CHUNK_SIZE = 500;

@Injectable()
export class ResponseCommentsRepository {
  private readonly logger = new Logger(ResponseCommentsRepository.name);

  constructor(private databaseService: DatabaseService) {}

  /**
   * Create multiple comment records, in chunks inside one transaction
   */
  async createMany(dataArray: NewResponseComment[]): Promise<ResponseComment[]> {
    if (dataArray.length === 0) return [];

    const records = await this.databaseService.db.transaction(async (tx) => {
      const created: ResponseComment[] = [];
      for (let start = 0; start < dataArray.length; start += COMMENT_INSERT_CHUNK_SIZE) {
        const chunk = dataArray.slice(start, start + COMMENT_INSERT_CHUNK_SIZE);
        created.push(
          ...(await tx.insert(responseComments).values(chunk).returning()),
        );
      }
      return created;
    });

    this.logger.debug(`Created ${records.length} response comments`);
    return records;
  }

  async findByBatchId(batchId: string): Promise<ResponseComment[]> {
    return this.databaseService.db
      .select()
      .from(responseComments)
      .where(eq(responseComments.batchId, batchId));
  }

  /**
   * One page of classified comments, oldest analysis first
   */
  async findPage(query: CommentPageQuery): Promise<ResponseComment[]> {
    const conditions: SQL[] = [];
    if (query.batchId) {
      conditions.push(eq(responseComments.batchId, query.batchId));
    }
    if (query.courseName) {
      conditions.push(eq(surveyBatches.courseName, query.courseName));
    }
    if (query.sentiment) {
      conditions.push(eq(responseComments.sentiment, query.sentiment));
    }
    if (query.category) {
      conditions.push(eq(responseComments.category, query.category));
    }

    const rows = await this.databaseService.db
      .select({ comment: responseComments })
      .from(responseComments)
      .innerJoin(surveyBatches, eq(responseComments.batchId, surveyBatches.id))
      .where(and(...conditions))
      .orderBy(asc(responseComments.analyzedAt), asc(responseComments.id))
      .limit(query.limit)
      .offset(query.skip);

    return rows.map((row) => row.comment);
  }

  async countByBatchId(batchId: string): Promise<number> {
    const [result] = await this.databaseService.db
      .select({ count: count() })
      .from(responseComments)
      .where(eq(responseComments.batchId, batchId));

    return result?.count ?? 0;
  }

  async deleteByBatchId(batchId: string): Promise<number> {
    const deleted = await this.databaseService.db
      .delete(responseComments)
      .where(eq(responseComments.batchId, batchId))
      .returning({ id: responseComments.id });
    return deleted.length;
  }
}
