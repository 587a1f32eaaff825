import {
  pgTable,
  uuid,
  text,
  real,
  integer,
  timestamp,
  unique,
} from 'drizzle-orm/pg-core';
import { ALL_STUDENTS } from '@app/shared-types';
import { surveyBatches } from './survey-batches.schema';

/**
 * Survey Summaries table - pre-aggregated scores per batch segment
 *
 * Derived data: recomputed from survey_responses and response_comments
 * and upserted on (batch_id, student_attribute). Safe to drop at any time.
 */
export const surveySummaries = pgTable(
  'survey_summaries',
  {
    id: uuid('id').defaultRandom().primaryKey(),

    batchId: uuid('batch_id')
      .notNull()
      .references(() => surveyBatches.id, { onDelete: 'cascade' }),
    studentAttribute: text('student_attribute').notNull().default(ALL_STUDENTS),

    // Mean scores, 2 decimal places, null when no response answered
    scoreSatisfactionOverall: real('score_satisfaction_overall'),
    scoreContentVolume: real('score_content_volume'),
    scoreContentUnderstanding: real('score_content_understanding'),
    scoreContentAnnouncement: real('score_content_announcement'),
    scoreInstructorOverall: real('score_instructor_overall'),
    scoreInstructorTime: real('score_instructor_time'),
    scoreInstructorQa: real('score_instructor_qa'),
    scoreInstructorSpeaking: real('score_instructor_speaking'),
    scoreSelfPreparation: real('score_self_preparation'),
    scoreSelfMotivation: real('score_self_motivation'),
    scoreSelfFuture: real('score_self_future'),
    responseCount: integer('response_count').notNull().default(0),

    // Net Promoter Score
    npsScore: real('nps_score').notNull().default(0),
    npsPromoters: integer('nps_promoters').notNull().default(0),
    npsPassives: integer('nps_passives').notNull().default(0),
    npsDetractors: integer('nps_detractors').notNull().default(0),
    npsTotal: integer('nps_total').notNull().default(0),

    // Mirrors the comment_summaries rows of the same segment
    commentsCount: integer('comments_count').notNull().default(0),
    importantCommentsCount: integer('important_comments_count')
      .notNull()
      .default(0),

    createdAt: timestamp('created_at').notNull().defaultNow(),
    updatedAt: timestamp('updated_at').notNull().defaultNow(),
  },
  (table) => ({
    segment: unique('uq_survey_summaries_segment').on(
      table.batchId,
      table.studentAttribute,
    ),
  }),
);

export type SurveySummary = typeof surveySummaries.$inferSelect;
export type NewSurveySummary = typeof surveySummaries.$inferInsert;
