import {
  CommentCategory,
  ImportanceLevel,
  SentimentLabel,
} from '@app/shared-types';

/**
 * Deterministic classification rules shared by the comment classifier.
 *
 * Every function here is total: unknown input maps to a default label,
 * never to an error.
 */

const SENTIMENT_ALIASES: ReadonlyArray<[SentimentLabel, readonly string[]]> = [
  [SentimentLabel.POSITIVE, ['positive', 'pos', 'ポジティブ', '肯定的', '好意的']],
  [SentimentLabel.NEGATIVE, ['negative', 'neg', 'ネガティブ', '否定的', '批判的']],
  [SentimentLabel.NEUTRAL, ['neutral', 'ニュートラル', '中立', '中立的']],
];

const POSITIVE_KEYWORDS = [
  '良かった',
  'よかった',
  '分かりやすい',
  'わかりやすい',
  '面白',
  '楽しい',
  'ありがとう',
  '満足',
  '勉強になった',
  'great',
  'helpful',
];

const NEGATIVE_KEYWORDS = [
  '分かりにくい',
  'わかりにくい',
  '難しすぎ',
  'つまらない',
  '不満',
  '残念',
  '聞き取りにくい',
  '見づらい',
  'confusing',
  'boring',
];

/**
 * Checked in order; the first bucket with a matching keyword wins
 */
const CATEGORY_KEYWORDS: ReadonlyArray<[CommentCategory, readonly string[]]> = [
  [
    CommentCategory.MATERIALS,
    ['資料', 'スライド', '教材', 'テキスト', 'material', 'slide'],
  ],
  [
    CommentCategory.OPERATIONS,
    ['運営', 'アナウンス', '配信', '音声', '時間', 'operation', 'schedule'],
  ],
  [
    CommentCategory.INSTRUCTOR,
    ['講師', '先生', '話し方', 'instructor', 'teacher', 'lecturer'],
  ],
  [
    CommentCategory.CONTENT,
    ['内容', '理解', '難易度', 'カリキュラム', 'content', 'curriculum'],
  ],
];

/**
 * Ordinal importance labels to scores
 */
const IMPORTANCE_LEVEL_SCORES: Record<string, number> = {
  critical: 1.0,
  very_high: 1.0,
  high: 0.8,
  高: 0.8,
  medium: 0.5,
  中: 0.5,
  low: 0.3,
  低: 0.3,
  minor: 0.2,
};

const HIGH_IMPORTANCE_LABELS = new Set(['critical', 'very_high', 'high', '高']);
const MEDIUM_IMPORTANCE_LABELS = new Set(['medium', '中']);
const LOW_IMPORTANCE_LABELS = new Set(['low', 'minor', '低']);

const UNSAFE_RISK_LEVELS = new Set(['high', 'critical', 'severe', '高', '危険']);

export const DEFAULT_RISK_LEVEL = 'none';
export const IMPROVEMENT_THRESHOLD = 0.7;
export const LENGTH_SCORE_DIVISOR = 400;

function fold(value: string): string {
  return value.normalize('NFKC').trim().toLowerCase();
}

function countOccurrences(text: string, keyword: string): number {
  let count = 0;
  let index = text.indexOf(keyword);
  while (index !== -1) {
    count += 1;
    index = text.indexOf(keyword, index + keyword.length);
  }
  return count;
}

/**
 * Collapse any sentiment label to positive, negative or neutral
 */
export function normalizeSentiment(label: string | null | undefined): SentimentLabel {
  if (!label) {
    return SentimentLabel.NEUTRAL;
  }
  const folded = fold(label);
  const match = SENTIMENT_ALIASES.find(([, aliases]) => aliases.includes(folded));
  return match ? match[0] : SentimentLabel.NEUTRAL;
}

/**
 * Majority vote of positive against negative keyword hits; ties are neutral
 */
export function sentimentFromKeywords(text: string): SentimentLabel {
  const folded = fold(text);
  const positive = POSITIVE_KEYWORDS.reduce(
    (sum, keyword) => sum + countOccurrences(folded, keyword),
    0,
  );
  const negative = NEGATIVE_KEYWORDS.reduce(
    (sum, keyword) => sum + countOccurrences(folded, keyword),
    0,
  );
  if (positive > negative) {
    return SentimentLabel.POSITIVE;
  }
  return negative > positive ? SentimentLabel.NEGATIVE : SentimentLabel.NEUTRAL;
}

function matchCategory(value: string): CommentCategory | undefined {
  const folded = fold(value);
  if (folded.length === 0) {
    return undefined;
  }
  for (const [category, keywords] of CATEGORY_KEYWORDS) {
    if (keywords.some((keyword) => folded.includes(keyword))) {
      return category;
    }
  }
  return undefined;
}

/**
 * Fold a category into a canonical bucket: the LLM's label first,
 * then the comment text itself
 */
export function normalizeCategory(
  llmCategory: string | undefined,
  commentText: string,
): CommentCategory {
  return (
    (llmCategory ? matchCategory(llmCategory) : undefined) ??
    matchCategory(commentText) ??
    CommentCategory.OTHER
  );
}

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round((value + Number.EPSILON) * factor) / factor;
}

/**
 * Resolve the importance score in [0, 1]: the LLM's number, else the
 * LLM's level through the ordinal table, else the comment length
 */
export function resolveImportanceScore(
  llmScore: number | undefined,
  llmLevel: string | undefined,
  commentText: string,
): number {
  if (llmScore !== undefined && Number.isFinite(llmScore)) {
    return Math.min(Math.max(llmScore, 0), 1);
  }
  if (llmLevel) {
    const mapped = IMPORTANCE_LEVEL_SCORES[fold(llmLevel)];
    if (mapped !== undefined) {
      return mapped;
    }
  }
  const length = [...commentText].length;
  return roundTo(Math.min(length / LENGTH_SCORE_DIVISOR, 1), 3);
}

export function resolveImportanceLevel(
  llmLevel: string | undefined,
  score: number,
): ImportanceLevel {
  const folded = llmLevel ? fold(llmLevel) : '';
  if (HIGH_IMPORTANCE_LABELS.has(folded)) {
    return ImportanceLevel.HIGH;
  }
  if (MEDIUM_IMPORTANCE_LABELS.has(folded)) {
    return ImportanceLevel.MEDIUM;
  }
  if (LOW_IMPORTANCE_LABELS.has(folded)) {
    return ImportanceLevel.LOW;
  }
  if (score > IMPROVEMENT_THRESHOLD) {
    return ImportanceLevel.HIGH;
  }
  return score >= 0.4 ? ImportanceLevel.MEDIUM : ImportanceLevel.LOW;
}

export function containsNgKeyword(
  text: string,
  ngKeywords: readonly string[],
): boolean {
  return ngKeywords.some((keyword) => keyword.length > 0 && text.includes(keyword));
}

export function normalizeRiskLevel(
  llmRiskLevel: string | undefined,
  hasNgKeyword: boolean,
): string {
  if (hasNgKeyword) {
    return 'high';
  }
  const folded = llmRiskLevel ? fold(llmRiskLevel) : '';
  return folded.length > 0 ? folded : DEFAULT_RISK_LEVEL;
}

/**
 * Unsafe when the text hits an NG keyword, the LLM said so, or the
 * LLM's risk level is severe
 */
export function isCommentSafe(
  hasNgKeyword: boolean,
  llmIsSafe: boolean | undefined,
  llmRiskLevel: string | undefined,
): boolean {
  if (hasNgKeyword || llmIsSafe === false) {
    return false;
  }
  return !(llmRiskLevel && UNSAFE_RISK_LEVELS.has(fold(llmRiskLevel)));
}

/**
 * Parse the comma-separated NG_KEYWORDS setting
 */
export function parseKeywordList(value: string): string[] {
  return value
    .split(',')
    .map((keyword) => keyword.trim())
    .filter((keyword) => keyword.length > 0);
}
