import { Injectable, Logger } from '@nestjs/common';
import { and, eq, notInArray, sql } from 'drizzle-orm';
import { DatabaseService } from '../database.service';
import {
  commentSummaries,
  surveySummaries,
  CommentSummary,
  SurveySummary,
} from '../schema';

/**
 * Complete summary rows as computed by the aggregator; the repository
 * only adds identity and timestamps
 */
export type SurveySummaryValues = Omit<
  SurveySummary,
  'id' | 'createdAt' | 'updatedAt'
>;

export type CommentSummaryValues = Omit<
  CommentSummary,
  'id' | 'createdAt' | 'updatedAt'
>;

export interface SummaryWriteResult {
  surveySummaries: SurveySummary[];
  commentSummaries: CommentSummary[];
}

@Injectable()
export class SummariesRepository {
  private readonly logger = new Logger(SummariesRepository.name);

  constructor(private databaseService: DatabaseService) {}

  /**
   * Replace the summaries of one batch in a single transaction.
   *
   * Segments absent from surveyRows are deleted; the rest are upserted on
   * their unique keys, so running this twice with the same values leaves
   * the tables unchanged apart from updatedAt.
   */
  async upsertBatchSummaries(
    batchId: string,
    surveyRows: SurveySummaryValues[],
    commentRows: CommentSummaryValues[],
  ): Promise<SummaryWriteResult> {
    const segments = surveyRows.map((row) => row.studentAttribute);

    return this.databaseService.db.transaction(async (tx) => {
      await tx
        .delete(commentSummaries)
        .where(
          segments.length === 0
            ? eq(commentSummaries.batchId, batchId)
            : and(
                eq(commentSummaries.batchId, batchId),
                notInArray(commentSummaries.studentAttribute, segments),
              ),
        );
      await tx
        .delete(surveySummaries)
        .where(
          segments.length === 0
            ? eq(surveySummaries.batchId, batchId)
            : and(
                eq(surveySummaries.batchId, batchId),
                notInArray(surveySummaries.studentAttribute, segments),
              ),
        );

      const now = new Date();
      const writtenSurvey: SurveySummary[] = [];

      for (const row of surveyRows) {
        const [written] = await tx
          .insert(surveySummaries)
          .values({ ...row, updatedAt: now })
          .onConflictDoUpdate({
            target: [surveySummaries.batchId, surveySummaries.studentAttribute],
            set: { ...row, updatedAt: now },
          })
          .returning();
        writtenSurvey.push(written);
      }

      const writtenComments =
        commentRows.length === 0
          ? []
          : await tx
              .insert(commentSummaries)
              .values(commentRows.map((row) => ({ ...row, updatedAt: now })))
              .onConflictDoUpdate({
                target: [
                  commentSummaries.batchId,
                  commentSummaries.studentAttribute,
                  commentSummaries.analysisType,
                  commentSummaries.label,
                ],
                set: {
                  count: sql`excluded.count`,
                  updatedAt: now,
                },
              })
              .returning();

      this.logger.debug(
        `Upserted ${writtenSurvey.length} survey summaries and ${writtenComments.length} comment summaries`,
      );

      return {
        surveySummaries: writtenSurvey,
        commentSummaries: writtenComments,
      };
    });
  }

  async findSurveySummary(
    batchId: string,
    studentAttribute: string,
  ): Promise<SurveySummary | undefined> {
    const [summary] = await this.databaseService.db
      .select()
      .from(surveySummaries)
      .where(
        and(
          eq(surveySummaries.batchId, batchId),
          eq(surveySummaries.studentAttribute, studentAttribute),
        ),
      );
    return summary;
  }

  async findCommentSummaries(
    batchId: string,
    studentAttribute: string,
  ): Promise<CommentSummary[]> {
    return this.databaseService.db
      .select()
      .from(commentSummaries)
      .where(
        and(
          eq(commentSummaries.batchId, batchId),
          eq(commentSummaries.studentAttribute, studentAttribute),
        ),
      );
  }
}
