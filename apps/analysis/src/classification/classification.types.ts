import {
  AnalysisStatus,
  CommentCategory,
  ImportanceLevel,
  SentimentLabel,
} from '@app/shared-types';
import type { AnalysisContext } from '@app/llm';

/**
 * Classification of one comment. Every field is populated, whatever
 * happened with the LLM call.
 */
export interface ClassificationResult {
  category: CommentCategory;
  sentiment: SentimentLabel;
  importanceLevel: ImportanceLevel;
  importanceScore: number;
  riskLevel: string;
  isSafe: boolean;
  isImprovementNeeded: boolean;
  summary: string | null;
  tags: string[];
  status: AnalysisStatus;
  warnings: string[];
}

export interface ClassifyOptions {
  /** Required-column comments are stored without an LLM call */
  skipLlm?: boolean;
  context?: AnalysisContext;
  /** Prefix for log lines */
  correlationId?: string;
}
