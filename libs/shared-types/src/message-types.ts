/**
 * Message Payload Types
 *
 * Type-safe definitions for message payloads and the enums shared
 * between the gateway, the worker and the database schema.
 */

/**
 * Batch lifecycle status - shared across all services
 * Matches the database schema enum
 */
export enum BatchStatus {
  QUEUED = 'QUEUED',
  PROCESSING = 'PROCESSING',
  COMPLETED = 'COMPLETED',
  FAILED = 'FAILED',
}

/**
 * Preliminary uploads are superseded by confirmed ones when
 * choosing the batch that represents a lecture.
 */
export enum BatchType {
  PRELIMINARY = 'preliminary',
  CONFIRMED = 'confirmed',
}

export enum SentimentLabel {
  NEGATIVE = 'negative',
  NEUTRAL = 'neutral',
  POSITIVE = 'positive',
}

export enum CommentCategory {
  CONTENT = 'content',
  MATERIALS = 'materials',
  OPERATIONS = 'operations',
  INSTRUCTOR = 'instructor',
  OTHER = 'other',
}

export enum ImportanceLevel {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
}

export enum QuestionType {
  LEARNED = 'learned',
  GOOD_POINTS = 'good_points',
  IMPROVEMENTS = 'improvements',
  INSTRUCTOR_FEEDBACK = 'instructor_feedback',
  FUTURE_REQUESTS = 'future_requests',
  FREE_COMMENT = 'free_comment',
}

/**
 * How a stored comment got its classification
 */
export enum AnalysisStatus {
  ANALYZED = 'analyzed',
  FALLBACK = 'fallback',
  SKIPPED = 'skipped',
}

export enum SummaryAnalysisType {
  SENTIMENT = 'sentiment',
  CATEGORY = 'category',
  IMPORTANCE = 'importance',
}

/**
 * Segment label used for summaries over every response of a batch
 */
export const ALL_STUDENTS = 'ALL';

export interface ProcessUploadMessage {
  batchId: string;
  storageUri: string;
  timestamp: Date;
}

export interface RecomputeSummaryMessage {
  batchId: string;
  timestamp: Date;
}

/**
 * Payload carried by each worker message pattern
 */
export interface JobMessages {
  'upload.process': ProcessUploadMessage;
  'summary.recompute': RecomputeSummaryMessage;
}

export type JobPattern = keyof JobMessages;
