import { ALL_STUDENTS, QuestionType } from '@app/shared-types';

/**
 * Free-text columns sent to the LLM
 */
export const LLM_ANALYSIS_PREFIX = '（任意）';

/**
 * Required free-text columns: stored as comments, never sent to the LLM
 */
export const REQUIRED_COMMENT_PREFIX = '【必須】';

export const COMMENT_COLUMN_PREFIXES = [
  LLM_ANALYSIS_PREFIX,
  REQUIRED_COMMENT_PREFIX,
] as const;

export const ACCOUNT_ID_HEADERS = ['アカウントID', 'account_id', 'アカウント ID'];
export const STUDENT_ATTRIBUTE_HEADERS = ['受講生の属性', '受講生属性', 'student_attribute'];

export type ScoreField =
  | 'scoreSatisfactionOverall'
  | 'scoreContentVolume'
  | 'scoreContentUnderstanding'
  | 'scoreContentAnnouncement'
  | 'scoreInstructorOverall'
  | 'scoreInstructorTime'
  | 'scoreInstructorQa'
  | 'scoreInstructorSpeaking'
  | 'scoreSelfPreparation'
  | 'scoreSelfMotivation'
  | 'scoreSelfFuture'
  | 'scoreRecommendFriend';

export type SurveyScores = Record<ScoreField, number | null>;

const CONTENT = '本日の講義内容について５段階で教えてください。';
const INSTRUCTOR = '本日の講師について５段階で教えてください。';
const SELF = 'ご自身について５段階で教えてください。';

/**
 * Survey question headers and the response column each one fills.
 * Multi-part questions put the sub-item after a line break in the header.
 */
export const SCORE_COLUMNS: ReadonlyArray<{ header: string; field: ScoreField }> = [
  { header: '本日の総合的な満足度を５段階で教えてください。', field: 'scoreSatisfactionOverall' },
  { header: `${CONTENT}\n学習量は適切だった`, field: 'scoreContentVolume' },
  { header: `${CONTENT}\n講義内容が十分に理解できた`, field: 'scoreContentUnderstanding' },
  { header: `${CONTENT}\n運営側のアナウンスが適切だった`, field: 'scoreContentAnnouncement' },
  { header: '本日の講師の総合的な満足度を５段階で教えてください。', field: 'scoreInstructorOverall' },
  { header: `${INSTRUCTOR}\n授業時間を効率的に使っていた`, field: 'scoreInstructorTime' },
  { header: `${INSTRUCTOR}\n質問に丁寧に対応してくれた`, field: 'scoreInstructorQa' },
  { header: `${INSTRUCTOR}\n話し方や声の大きさが適切だった`, field: 'scoreInstructorSpeaking' },
  { header: `${SELF}\n事前に予習をした`, field: 'scoreSelfPreparation' },
  { header: `${SELF}\n意欲をもって講義に臨んだ`, field: 'scoreSelfMotivation' },
  { header: `${SELF}\n今回学んだことを学習や研究に生かせる`, field: 'scoreSelfFuture' },
  { header: '親しいご友人にこの講義の受講をお薦めしますか？', field: 'scoreRecommendFriend' },
];

const EMPTY_SCORES: SurveyScores = {
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
  scoreRecommendFriend: null,
};

export type SurveyRow = Record<string, string>;

export interface Respondent {
  accountId: string | null;
  studentAttribute: string;
}

export interface ExtractedComment {
  column: string;
  text: string;
  analyzeWithLlm: boolean;
  questionType: QuestionType;
}

export function isCommentColumn(header: string): boolean {
  return COMMENT_COLUMN_PREFIXES.some((prefix) => header.startsWith(prefix));
}

export function isLlmAnalysisColumn(header: string): boolean {
  return header.startsWith(LLM_ANALYSIS_PREFIX);
}

/**
 * Classify a comment column by keywords in its header, prefixes removed
 */
export function mapColumnToQuestionType(header: string): QuestionType {
  let name = header;
  for (const prefix of COMMENT_COLUMN_PREFIXES) {
    name = name.split(prefix).join('');
  }
  name = name.trim();

  if (name.includes('学んだこと') || name.includes('学び')) {
    return QuestionType.LEARNED;
  }
  if (name.includes('良かった点') || name.includes('良い点')) {
    return QuestionType.GOOD_POINTS;
  }
  if (name.includes('改善')) {
    return QuestionType.IMPROVEMENTS;
  }
  if (name.includes('講師') && name.includes('フィードバック')) {
    return QuestionType.INSTRUCTOR_FEEDBACK;
  }
  if (name.includes('要望')) {
    return QuestionType.FUTURE_REQUESTS;
  }
  return QuestionType.FREE_COMMENT;
}

/**
 * Non-blank, trimmed comment cells of one row, in column order
 */
export function extractComments(
  row: SurveyRow,
  commentColumns: readonly string[],
): ExtractedComment[] {
  const comments: ExtractedComment[] = [];
  for (const column of commentColumns) {
    const text = (row[column] ?? '').trim();
    if (text.length === 0) {
      continue;
    }
    comments.push({
      column,
      text,
      analyzeWithLlm: isLlmAnalysisColumn(column),
      questionType: mapColumnToQuestionType(column),
    });
  }
  return comments;
}

/**
 * Value of the first alias header present in the row, even when blank
 */
export function readFirstValue(
  row: SurveyRow,
  headers: readonly string[],
): string | undefined {
  for (const header of headers) {
    if (header in row) {
      return row[header];
    }
  }
  return undefined;
}

export function extractRespondent(row: SurveyRow): Respondent {
  const accountId = readFirstValue(row, ACCOUNT_ID_HEADERS)?.trim();
  const studentAttribute = readFirstValue(row, STUDENT_ATTRIBUTE_HEADERS)?.trim();
  return {
    accountId: accountId ? accountId : null,
    studentAttribute: studentAttribute ? studentAttribute : ALL_STUDENTS,
  };
}

/**
 * Parse a rating cell. Only digit strings count; full-width digits are accepted.
 */
export function parseScore(value: string | undefined): number | null {
  if (value === undefined) {
    return null;
  }
  const normalized = value.normalize('NFKC').trim();
  return /^[0-9]+$/.test(normalized) ? parseInt(normalized, 10) : null;
}

export function extractScores(row: SurveyRow): SurveyScores {
  const scores: SurveyScores = { ...EMPTY_SCORES };
  for (const { header, field } of SCORE_COLUMNS) {
    scores[field] = parseScore(row[header]);
  }
  return scores;
}
