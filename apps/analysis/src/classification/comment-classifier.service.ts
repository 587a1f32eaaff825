import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  AnalysisStatus,
  CommentCategory,
  ImportanceLevel,
  SentimentLabel,
  getErrorMessage,
  sanitizeForLog,
} from '@app/shared-types';
import { LlmAnalysisResult, LlmClientService } from '@app/llm';
import {
  DEFAULT_RISK_LEVEL,
  IMPROVEMENT_THRESHOLD,
  containsNgKeyword,
  isCommentSafe,
  normalizeCategory,
  normalizeRiskLevel,
  normalizeSentiment,
  parseKeywordList,
  resolveImportanceLevel,
  resolveImportanceScore,
  sentimentFromKeywords,
} from './classification.rules';
import { ClassificationResult, ClassifyOptions } from './classification.types';

export const DEFAULT_NG_KEYWORDS = '不適切,誹謗中傷,差別';

/**
 * Comment Classifier
 *
 * Wraps the LLM client with deterministic fallbacks. classify() always
 * resolves: LLM failures become a fallback result with a warning, so one
 * bad comment never aborts a batch.
 */
@Injectable()
export class CommentClassifierService {
  private readonly logger = new Logger(CommentClassifierService.name);
  private readonly ngKeywords: string[];

  constructor(
    private readonly llmClient: LlmClientService,
    configService: ConfigService,
  ) {
    this.ngKeywords = parseKeywordList(
      configService.get<string>('NG_KEYWORDS', DEFAULT_NG_KEYWORDS),
    );
  }

  async classify(
    commentText: string,
    options: ClassifyOptions = {},
  ): Promise<ClassificationResult> {
    const tag = `[${options.correlationId ?? 'classify'}]`;

    if (options.skipLlm) {
      return this.skippedResult();
    }

    let analysis: LlmAnalysisResult | undefined;
    const warnings: string[] = [];

    try {
      analysis = await this.llmClient.analyze(commentText, options.context);
      warnings.push(...analysis.warnings);
    } catch (error) {
      const warning = `LLM analysis failed: ${getErrorMessage(error)}`;
      warnings.push(warning);
      this.logger.debug(
        `${tag} Falling back for "${sanitizeForLog(commentText, 50)}": ${warning}`,
      );
    }

    if (warnings.length > 0) {
      this.logger.warn(`${tag} LLM warnings for comment: ${warnings.join('; ')}`);
    }

    try {
      return this.buildResult(commentText, analysis, warnings);
    } catch (error) {
      // Reached only when the decoder let a mistyped field through
      this.logger.error(
        `${tag} Classification rules failed`,
        error instanceof Error ? error.stack : String(error),
      );
      return {
        ...this.skippedResult(),
        status: AnalysisStatus.FALLBACK,
        warnings: [...warnings, `Classification failed: ${getErrorMessage(error)}`],
      };
    }
  }

  private buildResult(
    commentText: string,
    analysis: LlmAnalysisResult | undefined,
    warnings: string[],
  ): ClassificationResult {
    const hasNgKeyword = containsNgKeyword(commentText, this.ngKeywords);
    const importanceScore = resolveImportanceScore(
      analysis?.importanceScore,
      analysis?.priority,
      commentText,
    );

    return {
      category: normalizeCategory(analysis?.category, commentText),
      sentiment: analysis?.sentiment
        ? normalizeSentiment(analysis.sentiment)
        : sentimentFromKeywords(commentText),
      importanceLevel: resolveImportanceLevel(analysis?.priority, importanceScore),
      importanceScore,
      riskLevel: normalizeRiskLevel(analysis?.riskLevel, hasNgKeyword),
      isSafe: isCommentSafe(hasNgKeyword, analysis?.isSafe, analysis?.riskLevel),
      isImprovementNeeded: importanceScore > IMPROVEMENT_THRESHOLD,
      summary: analysis?.summary ?? null,
      tags: analysis?.tags ?? [],
      status: analysis ? AnalysisStatus.ANALYZED : AnalysisStatus.FALLBACK,
      warnings,
    };
  }

  private skippedResult(): ClassificationResult {
    return {
      category: CommentCategory.OTHER,
      sentiment: SentimentLabel.NEUTRAL,
      importanceLevel: ImportanceLevel.LOW,
      importanceScore: 0,
      riskLevel: DEFAULT_RISK_LEVEL,
      isSafe: true,
      isImprovementNeeded: false,
      summary: null,
      tags: [],
      status: AnalysisStatus.SKIPPED,
      warnings: [],
    };
  }
}
