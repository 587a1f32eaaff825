import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import {
  AnalysisStatus,
  CommentCategory,
  ImportanceLevel,
  SentimentLabel,
} from '@app/shared-types';
import {
  LlmAnalysisResult,
  LlmClientService,
  LlmTimeoutError,
  LlmResponseFormatError,
  MOCK_PROVIDER_WARNING,
} from '@app/llm';
import { CommentClassifierService } from './comment-classifier.service';

function llmResult(overrides: Partial<LlmAnalysisResult> = {}): LlmAnalysisResult {
  return { tags: [], raw: {}, warnings: [], ...overrides };
}

describe('CommentClassifierService', () => {
  let classifier: CommentClassifierService;
  let analyze: jest.Mock;

  beforeEach(async () => {
    analyze = jest.fn();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        CommentClassifierService,
        { provide: LlmClientService, useValue: { analyze } },
        {
          provide: ConfigService,
          useValue: new ConfigService({ NG_KEYWORDS: '不適切,差別' }),
        },
      ],
    }).compile();

    classifier = module.get(CommentClassifierService);
  });

  it('should normalize a full LLM analysis', async () => {
    analyze.mockResolvedValue(
      llmResult({
        category: '講師',
        sentiment: 'ポジティブ',
        priority: 'high',
        importanceScore: 0.9,
        riskLevel: 'Low',
        isSafe: true,
        summary: '説明が丁寧',
        tags: ['説明'],
      }),
    );

    const result = await classifier.classify('先生の説明が丁寧でした', {
      context: { courseName: 'Data Science', questionText: '（任意）講師への感想' },
    });

    expect(result).toEqual({
      category: CommentCategory.INSTRUCTOR,
      sentiment: SentimentLabel.POSITIVE,
      importanceLevel: ImportanceLevel.HIGH,
      importanceScore: 0.9,
      riskLevel: 'low',
      isSafe: true,
      isImprovementNeeded: true,
      summary: '説明が丁寧',
      tags: ['説明'],
      status: AnalysisStatus.ANALYZED,
      warnings: [],
    });
    expect(analyze).toHaveBeenCalledWith('先生の説明が丁寧でした', {
      courseName: 'Data Science',
      questionText: '（任意）講師への感想',
    });
  });

  it('should not call the LLM for skipped comments', async () => {
    const result = await classifier.classify('必須回答', { skipLlm: true });

    expect(analyze).not.toHaveBeenCalled();
    expect(result).toMatchObject({
      category: CommentCategory.OTHER,
      sentiment: SentimentLabel.NEUTRAL,
      importanceLevel: ImportanceLevel.LOW,
      importanceScore: 0,
      riskLevel: 'none',
      isSafe: true,
      status: AnalysisStatus.SKIPPED,
      warnings: [],
    });
  });

  it.each([
    ['timeout', new LlmTimeoutError('LLM API request timed out after 15000ms')],
    ['format', new LlmResponseFormatError('LLM response is not a JSON object: array')],
    ['plain error', new Error('commentText must not be empty')],
  ])('should fall back on a %s error', async (_name, error) => {
    analyze.mockRejectedValue(error);

    const result = await classifier.classify('資料が分かりにくい');

    expect(result.status).toBe(AnalysisStatus.FALLBACK);
    expect(result.category).toBe(CommentCategory.MATERIALS);
    expect(result.sentiment).toBe(SentimentLabel.NEGATIVE);
    expect(result.importanceScore).toBe(0.023);
    expect(result.importanceLevel).toBe(ImportanceLevel.LOW);
    expect(result.warnings).toEqual([`LLM analysis failed: ${error.message}`]);
  });

  it('should mark NG keyword comments unsafe and high risk', async () => {
    analyze.mockResolvedValue(llmResult({ riskLevel: 'none', isSafe: true }));

    const result = await classifier.classify('不適切な発言がありました');

    expect(result.isSafe).toBe(false);
    expect(result.riskLevel).toBe('high');
  });

  it('should honour an explicit unsafe flag from the LLM', async () => {
    analyze.mockResolvedValue(llmResult({ isSafe: false }));

    const result = await classifier.classify('普通のコメント');

    expect(result.isSafe).toBe(false);
    expect(result.riskLevel).toBe('none');
  });

  it('should use keyword sentiment when the LLM gives none', async () => {
    analyze.mockResolvedValue(llmResult({ warnings: ['tags field was not a list; dropping its value.'] }));

    const result = await classifier.classify('とても楽しい講義でした');

    expect(result.sentiment).toBe(SentimentLabel.POSITIVE);
    expect(result.status).toBe(AnalysisStatus.ANALYZED);
    expect(result.warnings).toEqual([
      'tags field was not a list; dropping its value.',
    ]);
  });

  it('should always return labels and a score in range', async () => {
    const inputs = ['', ' ', 'x'.repeat(2000), '😀', '\u0000'];
    analyze.mockRejectedValue(new Error('down'));

    for (const text of inputs) {
      const result = await classifier.classify(text);

      expect(Object.values(SentimentLabel)).toContain(result.sentiment);
      expect(Object.values(CommentCategory)).toContain(result.category);
      expect(result.importanceScore).toBeGreaterThanOrEqual(0);
      expect(result.importanceScore).toBeLessThanOrEqual(1);
    }
  });
});

describe('CommentClassifierService with the mock provider', () => {
  it('should classify through the real client deterministically', async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        CommentClassifierService,
        LlmClientService,
        {
          provide: ConfigService,
          useValue: new ConfigService({ LLM_PROVIDER: 'mock' }),
        },
      ],
    }).compile();
    const classifier = module.get(CommentClassifierService);

    const result = await classifier.classify('スライドが見づらい');

    expect(result).toEqual({
      category: CommentCategory.MATERIALS,
      sentiment: SentimentLabel.NEUTRAL,
      importanceLevel: ImportanceLevel.LOW,
      importanceScore: 0.3,
      riskLevel: 'none',
      isSafe: true,
      isImprovementNeeded: false,
      summary: 'スライドが見づらい',
      tags: [],
      status: AnalysisStatus.ANALYZED,
      warnings: [MOCK_PROVIDER_WARNING],
    });
  });
});
