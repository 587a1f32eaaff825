import {
  ALL_STUDENTS,
  CommentCategory,
  ImportanceLevel,
  SentimentLabel,
  SummaryAnalysisType,
} from '@app/shared-types';
import type {
  CommentSummaryValues,
  ResponseComment,
  SurveyResponse,
  SurveySummaryValues,
} from '@app/database';

export type NpsScale = 5 | 10;

/** Rating columns averaged into the survey summary */
export const AVERAGED_SCORE_FIELDS = [
  'scoreSatisfactionOverall',
  'scoreContentVolume',
  'scoreContentUnderstanding',
  'scoreContentAnnouncement',
  'scoreInstructorOverall',
  'scoreInstructorTime',
  'scoreInstructorQa',
  'scoreInstructorSpeaking',
  'scoreSelfPreparation',
  'scoreSelfMotivation',
  'scoreSelfFuture',
] as const;

export type AveragedScoreField = (typeof AVERAGED_SCORE_FIELDS)[number];
export type ScoreAverages = Record<AveragedScoreField, number | null>;

export interface NpsBreakdown {
  score: number;
  promoters: number;
  passives: number;
  detractors: number;
  total: number;
}

export interface CommentCounts {
  sentiment: Record<SentimentLabel, number>;
  category: Record<CommentCategory, number>;
  importance: Record<ImportanceLevel, number>;
  total: number;
  important: number;
}

export interface SegmentSummary {
  survey: SurveySummaryValues;
  comments: CommentSummaryValues[];
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round((value + Number.EPSILON) * factor) / factor;
}

export function parseNpsScale(value: unknown): NpsScale {
  return Number(value) === 5 ? 5 : 10;
}

const EMPTY_AVERAGES: ScoreAverages = {
  scoreSatisfactionOverall: null,
  scoreContentVolume: null,
  scoreContentUnderstanding: null,
  scoreContentAnnouncement: null,
  scoreInstructorOverall: null,
  scoreInstructorTime: null,
  scoreInstructorQa: null,
  scoreInstructorSpeaking: null,
  scoreSelfPreparation: null,
  scoreSelfMotivation: null,
  scoreSelfFuture: null,
};

/**
 * Mean of each rating column over the responses that answered it,
 * 2 decimal places; null when nobody answered
 */
export function averageScores(responses: readonly SurveyResponse[]): ScoreAverages {
  const averages: ScoreAverages = { ...EMPTY_AVERAGES };
  for (const field of AVERAGED_SCORE_FIELDS) {
    const values = responses
      .map((response) => response[field])
      .filter((value): value is number => value !== null);
    if (values.length > 0) {
      const sum = values.reduce((acc, value) => acc + value, 0);
      averages[field] = round(sum / values.length, 2);
    }
  }
  return averages;
}

export type NpsGroup = 'promoter' | 'passive' | 'detractor';

/**
 * Bucket a recommend score; values outside the scale are not counted
 */
export function classifyNpsScore(
  score: number,
  scale: NpsScale,
): NpsGroup | undefined {
  if (scale === 5) {
    if (score === 5) return 'promoter';
    if (score === 3 || score === 4) return 'passive';
    if (score === 1 || score === 2) return 'detractor';
    return undefined;
  }
  if (score < 0 || score > 10) return undefined;
  if (score >= 9) return 'promoter';
  return score >= 7 ? 'passive' : 'detractor';
}

/**
 * NPS = (promoters - detractors) * 100 / total, 1 decimal place; 0 when
 * nobody answered. `total` is every non-null answer, so an out-of-scale
 * score counts against the share of promoters without joining a bucket.
 * Fractional scores are truncated before bucketing.
 */
export function computeNps(
  scores: ReadonlyArray<number | null>,
  scale: NpsScale,
): NpsBreakdown {
  const breakdown: NpsBreakdown = {
    score: 0,
    promoters: 0,
    passives: 0,
    detractors: 0,
    total: 0,
  };
  for (const score of scores) {
    if (score === null) continue;
    breakdown.total += 1;
    const group = classifyNpsScore(Math.trunc(score), scale);
    if (group === 'promoter') breakdown.promoters += 1;
    if (group === 'passive') breakdown.passives += 1;
    if (group === 'detractor') breakdown.detractors += 1;
  }
  if (breakdown.total > 0) {
    breakdown.score = round(
      ((breakdown.promoters - breakdown.detractors) * 100) / breakdown.total,
      1,
    );
  }
  return breakdown;
}

/**
 * Histograms over every label, zero counts included
 */
export function countComments(comments: readonly ResponseComment[]): CommentCounts {
  const counts: CommentCounts = {
    sentiment: {
      [SentimentLabel.NEGATIVE]: 0,
      [SentimentLabel.NEUTRAL]: 0,
      [SentimentLabel.POSITIVE]: 0,
    },
    category: {
      [CommentCategory.CONTENT]: 0,
      [CommentCategory.MATERIALS]: 0,
      [CommentCategory.OPERATIONS]: 0,
      [CommentCategory.INSTRUCTOR]: 0,
      [CommentCategory.OTHER]: 0,
    },
    importance: {
      [ImportanceLevel.LOW]: 0,
      [ImportanceLevel.MEDIUM]: 0,
      [ImportanceLevel.HIGH]: 0,
    },
    total: comments.length,
    important: 0,
  };
  for (const comment of comments) {
    counts.sentiment[comment.sentiment] += 1;
    counts.category[comment.category] += 1;
    counts.importance[comment.importanceLevel] += 1;
  }
  counts.important =
    counts.importance[ImportanceLevel.MEDIUM] + counts.importance[ImportanceLevel.HIGH];
  return counts;
}

/**
 * ALL first, then each distinct student attribute in sorted order
 */
export function listSegments(responses: readonly SurveyResponse[]): string[] {
  const attributes = new Set(
    responses
      .map((response) => response.studentAttribute)
      .filter((attribute) => attribute !== ALL_STUDENTS),
  );
  return [ALL_STUDENTS, ...[...attributes].sort()];
}

function histogramRows(
  batchId: string,
  studentAttribute: string,
  analysisType: SummaryAnalysisType,
  histogram: Record<string, number>,
): CommentSummaryValues[] {
  return Object.entries(histogram).map(([label, count]) => ({
    batchId,
    studentAttribute,
    analysisType,
    label,
    count,
  }));
}

/**
 * Survey and comment summary rows for one segment of a batch. The survey
 * row's comment counts are taken from the same histograms.
 */
export function buildSegmentSummary(
  batchId: string,
  studentAttribute: string,
  responses: readonly SurveyResponse[],
  comments: readonly ResponseComment[],
  scale: NpsScale,
): SegmentSummary {
  const nps = computeNps(
    responses.map((response) => response.scoreRecommendFriend),
    scale,
  );
  const counts = countComments(comments);

  return {
    survey: {
      batchId,
      studentAttribute,
      ...averageScores(responses),
      responseCount: responses.length,
      npsScore: nps.score,
      npsPromoters: nps.promoters,
      npsPassives: nps.passives,
      npsDetractors: nps.detractors,
      npsTotal: nps.total,
      commentsCount: counts.total,
      importantCommentsCount: counts.important,
    },
    comments: [
      ...histogramRows(batchId, studentAttribute, SummaryAnalysisType.SENTIMENT, counts.sentiment),
      ...histogramRows(batchId, studentAttribute, SummaryAnalysisType.CATEGORY, counts.category),
      ...histogramRows(batchId, studentAttribute, SummaryAnalysisType.IMPORTANCE, counts.importance),
    ],
  };
}

/**
 * Summaries for the ALL segment and every attribute segment. Comments join
 * their segment through the response they came from.
 */
export function buildBatchSummaries(
  batchId: string,
  responses: readonly SurveyResponse[],
  comments: readonly ResponseComment[],
  scale: NpsScale,
): SegmentSummary[] {
  const attributeByResponse = new Map(
    responses.map((response) => [response.id, response.studentAttribute]),
  );

  return listSegments(responses).map((segment) => {
    if (segment === ALL_STUDENTS) {
      return buildSegmentSummary(batchId, segment, responses, comments, scale);
    }
    return buildSegmentSummary(
      batchId,
      segment,
      responses.filter((response) => response.studentAttribute === segment),
      comments.filter(
        (comment) =>
          comment.responseId !== null &&
          attributeByResponse.get(comment.responseId) === segment,
      ),
      scale,
    );
  });
}
