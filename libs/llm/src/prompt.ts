import { AnalysisContext } from './llm.types';

const UNSPECIFIED = '（指定なし）';

export const ANALYSIS_INSTRUCTIONS = [
  '以下のJSONオブジェクトのみを返してください。',
  '{"category": "講義内容|講義資料|運営|講師|その他",',
  '"sentiment": "positive|negative|neutral",',
  '"importance_level": "high|medium|low", "importance_score": 0.0〜1.0,',
  '"fix_difficulty": "easy|hard|none",',
  '"risk_level": "none|low|medium|high", "is_safe": true|false,',
  '"summary": "50文字以内の要約", "tags": ["キーワード"]}',
].join(' ');

/**
 * Render the single-line prompt sent to chat-completion and generic backends
 */
export function buildPrompt(
  commentText: string,
  context: AnalysisContext = {},
): string {
  const sections = [
    'あなたは大学の講義改善を支援するアシスタントです。',
    '学生からのフィードバックコメントを分析してください。',
    `## 講義名 ${context.courseName || UNSPECIFIED}`,
    `## 質問項目 ${context.questionText || UNSPECIFIED}`,
    `## コメント \`\`\` ${commentText} \`\`\``,
    `## 指示 ${ANALYSIS_INSTRUCTIONS}`,
  ];
  return sections.join(' ').replace(/\s*\n\s*/g, ' ').trim();
}
