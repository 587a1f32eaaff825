/**
 * Survey CSV Test Fixtures
 *
 * Builders for uploaded survey files. Every cell is quoted, so headers
 * with embedded newlines (the rating sub-questions) survive.
 */

export const OPTIONAL_LEARNED_HEADER = '（任意）本日学んだことを教えてください';
export const OPTIONAL_IMPROVEMENT_HEADER = '（任意）改善点があれば教えてください';
export const REQUIRED_GOOD_POINTS_HEADER = '【必須】本日の講義の良かった点';
export const ATTRIBUTE_HEADER = '受講生の属性';
export const ACCOUNT_HEADER = 'アカウントID';
export const SATISFACTION_HEADER = '本日の総合的な満足度を５段階で教えてください。';
export const RECOMMEND_HEADER = '親しいご友人にこの講義の受講をお薦めしますか？';

function quote(cell: string): string {
  return `"${cell.replace(/"/g, '""')}"`;
}

export interface BuildSurveyCsvOptions {
  /** Prefix a UTF-8 byte-order mark */
  bom?: boolean;
}

export function buildSurveyCsv(
  headers: string[],
  rows: string[][] = [],
  options: BuildSurveyCsvOptions = {},
): Buffer {
  const text = [headers, ...rows]
    .map((cells) => cells.map(quote).join(','))
    .join('\r\n');
  return Buffer.from(`${options.bom ? '\uFEFF' : ''}${text}\r\n`, 'utf-8');
}

/**
 * Three respondents and two optional comment columns: six comment cells,
 * three of them non-blank
 */
export function buildThreeRowSurvey(): Buffer {
  return buildSurveyCsv(
    [
      ACCOUNT_HEADER,
      ATTRIBUTE_HEADER,
      SATISFACTION_HEADER,
      RECOMMEND_HEADER,
      OPTIONAL_LEARNED_HEADER,
      OPTIONAL_IMPROVEMENT_HEADER,
    ],
    [
      ['acc-1', '学生', '5', '10', '統計の基礎が分かりやすい', ''],
      ['acc-2', '社会人', '4', '8', '', ''],
      ['acc-3', '学生', '3', '3', '回帰分析を学んだ', '資料の文字が小さい'],
    ],
  );
}
