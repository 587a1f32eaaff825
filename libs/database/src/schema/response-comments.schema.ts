import {
  pgTable,
  uuid,
  text,
  real,
  boolean,
  timestamp,
  index,
} from 'drizzle-orm/pg-core';
import {
  AnalysisStatus,
  CommentCategory,
  ImportanceLevel,
  QuestionType,
  SentimentLabel,
} from '@app/shared-types';
import { surveyBatches } from './survey-batches.schema';
import { surveyResponses } from './survey-responses.schema';

/**
 * Response Comments table - one row per non-blank comment cell
 *
 * Classification columns are never null: comments the LLM could not
 * classify carry fallback values and analysisStatus = 'fallback'.
 * Rows are written once; analysisVersion records which classifier pass
 * produced them.
 */
export const responseComments = pgTable(
  'response_comments',
  {
    id: uuid('id').defaultRandom().primaryKey(),

    batchId: uuid('batch_id')
      .notNull()
      .references(() => surveyBatches.id, { onDelete: 'cascade' }),
    responseId: uuid('response_id').references(() => surveyResponses.id, {
      onDelete: 'set null',
    }),

    // Source cell
    questionLabel: text('question_label').notNull(),
    questionType: text('question_type', {
      enum: [
        QuestionType.LEARNED,
        QuestionType.GOOD_POINTS,
        QuestionType.IMPROVEMENTS,
        QuestionType.INSTRUCTOR_FEEDBACK,
        QuestionType.FUTURE_REQUESTS,
        QuestionType.FREE_COMMENT,
      ],
    }).notNull(),
    commentText: text('comment_text').notNull(),

    // Classification results
    category: text('category', {
      enum: [
        CommentCategory.CONTENT,
        CommentCategory.MATERIALS,
        CommentCategory.OPERATIONS,
        CommentCategory.INSTRUCTOR,
        CommentCategory.OTHER,
      ],
    }).notNull(),
    sentiment: text('sentiment', {
      enum: [
        SentimentLabel.NEGATIVE,
        SentimentLabel.NEUTRAL,
        SentimentLabel.POSITIVE,
      ],
    }).notNull(),
    importanceLevel: text('importance_level', {
      enum: [ImportanceLevel.LOW, ImportanceLevel.MEDIUM, ImportanceLevel.HIGH],
    }).notNull(),
    importanceScore: real('importance_score').notNull(), // 0.0 to 1.0
    riskLevel: text('risk_level').notNull(),
    isSafe: boolean('is_safe').notNull(),
    isImprovementNeeded: boolean('is_improvement_needed').notNull(),
    summary: text('summary'),
    tags: text('tags').array().notNull().default([]),

    // Provenance
    analysisStatus: text('analysis_status', {
      enum: [
        AnalysisStatus.ANALYZED,
        AnalysisStatus.FALLBACK,
        AnalysisStatus.SKIPPED,
      ],
    }).notNull(),
    warnings: text('warnings').array().notNull().default([]),
    analysisVersion: text('analysis_version').notNull(),
    analyzedAt: timestamp('analyzed_at').notNull().defaultNow(),
  },
  (table) => ({
    batchIdx: index('idx_response_comments_batch').on(table.batchId),
  }),
);

export type ResponseComment = typeof responseComments.$inferSelect;
export type NewResponseComment = typeof responseComments.$inferInsert;
