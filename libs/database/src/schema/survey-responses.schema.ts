import { pgTable, uuid, text, integer, index } from 'drizzle-orm/pg-core';
import { ALL_STUDENTS } from '@app/shared-types';
import { surveyBatches } from './survey-batches.schema';

/**
 * Survey Responses table - one structured row per CSV data row
 *
 * Score columns hold the 1-5 ratings (recommendFriend uses the NPS scale
 * configured for the deployment). Cells that were not plain digits are null.
 */
export const surveyResponses = pgTable(
  'survey_responses',
  {
    id: uuid('id').defaultRandom().primaryKey(),

    batchId: uuid('batch_id')
      .notNull()
      .references(() => surveyBatches.id, { onDelete: 'cascade' }),
    rowNumber: integer('row_number').notNull(),

    accountId: text('account_id'),
    studentAttribute: text('student_attribute').notNull().default(ALL_STUDENTS),

    scoreSatisfactionOverall: integer('score_satisfaction_overall'),
    scoreContentVolume: integer('score_content_volume'),
    scoreContentUnderstanding: integer('score_content_understanding'),
    scoreContentAnnouncement: integer('score_content_announcement'),
    scoreInstructorOverall: integer('score_instructor_overall'),
    scoreInstructorTime: integer('score_instructor_time'),
    scoreInstructorQa: integer('score_instructor_qa'),
    scoreInstructorSpeaking: integer('score_instructor_speaking'),
    scoreSelfPreparation: integer('score_self_preparation'),
    scoreSelfMotivation: integer('score_self_motivation'),
    scoreSelfFuture: integer('score_self_future'),
    scoreRecommendFriend: integer('score_recommend_friend'),
  },
  (table) => ({
    batchIdx: index('idx_survey_responses_batch').on(table.batchId),
  }),
);

export type SurveyResponse = typeof surveyResponses.$inferSelect;
export type NewSurveyResponse = typeof surveyResponses.$inferInsert;
