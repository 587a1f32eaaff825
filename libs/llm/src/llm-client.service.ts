import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { getErrorMessage } from '@app/shared-types';
import { FetchHttpClient, isAbortError } from './fetch-http.client';
import { buildLlmConfig } from './llm.config';
import {
  LlmClientError,
  LlmResponseFormatError,
  LlmTimeoutError,
} from './llm.errors';
import { normalizeAnalysisPayload, unwrapResponseBody } from './llm-response.decoder';
import {
  AnalysisContext,
  HttpClient,
  HttpResponse,
  JsonObject,
  LLM_HTTP_CLIENT,
  LlmAnalysisResult,
  LlmClientConfig,
} from './llm.types';
import { buildPrompt } from './prompt';

export const MOCK_PROVIDER_WARNING =
  'LLM provider is mock; returned a fixed analysis.';

const ERROR_BODY_EXCERPT_LENGTH = 200;
const MOCK_SUMMARY_LENGTH = 50;

/**
 * LLM Classification Client
 *
 * Sends one comment to the configured backend and returns a normalized
 * analysis record. Failures surface as LlmClientError subclasses and are
 * never retried here.
 */
@Injectable()
export class LlmClientService {
  private readonly logger = new Logger(LlmClientService.name);
  private readonly config: LlmClientConfig;
  private readonly httpClient: HttpClient;

  constructor(
    configService: ConfigService,
    @Optional()
    @Inject(LLM_HTTP_CLIENT)
    httpClient?: HttpClient,
  ) {
    this.config = buildLlmConfig(configService);
    this.httpClient = httpClient ?? new FetchHttpClient();

    if (this.config.provider === 'mock') {
      this.logger.warn(
        'LLM_PROVIDER is mock - comments receive a fixed neutral analysis',
      );
    } else {
      this.logger.log(
        `LLM client configured: provider=${this.config.provider}, model=${this.config.model ?? 'default'}`,
      );
    }
  }

  get provider(): LlmClientConfig['provider'] {
    return this.config.provider;
  }

  /**
   * Analyze one comment
   *
   * @throws LlmTimeoutError when the backend does not answer within the timeout
   * @throws LlmResponseFormatError when the answer is not a readable JSON object
   * @throws LlmClientError on transport failures and non-2xx answers
   */
  async analyze(
    commentText: string,
    context: AnalysisContext = {},
  ): Promise<LlmAnalysisResult> {
    if (commentText.trim().length === 0) {
      throw new Error('commentText must not be empty');
    }

    if (this.config.provider === 'mock') {
      return this.mockAnalysis(commentText);
    }

    const response = await this.send(commentText, context);

    if (response.status < 200 || response.status >= 300) {
      throw new LlmClientError(
        `LLM API returned HTTP error: ${response.status} - ${response.body.slice(0, ERROR_BODY_EXCERPT_LENGTH)}`,
      );
    }

    let body: unknown;
    try {
      body = JSON.parse(response.body);
    } catch {
      throw new LlmResponseFormatError(
        `LLM API returned non-JSON response: ${response.body.trim().slice(0, ERROR_BODY_EXCERPT_LENGTH)}`,
      );
    }

    const decoded = unwrapResponseBody(body);
    if (!decoded.ok) {
      throw new LlmResponseFormatError(decoded.error);
    }

    const result = normalizeAnalysisPayload(decoded.value);
    for (const warning of result.warnings) {
      this.logger.warn(`LLM response normalization: ${warning}`);
    }
    return result;
  }

  private async send(
    commentText: string,
    context: AnalysisContext,
  ): Promise<HttpResponse> {
    try {
      return await this.httpClient.post({
        url: this.buildUrl(),
        body: this.buildPayload(commentText, context),
        headers: this.buildHeaders(),
        timeoutMs: this.config.timeoutMs,
      });
    } catch (error) {
      if (isAbortError(error)) {
        throw new LlmTimeoutError(
          `LLM API call timed out after ${this.config.timeoutMs}ms`,
        );
      }
      throw new LlmClientError(
        `LLM API communication error: ${getErrorMessage(error)}`,
        error instanceof Error ? error : undefined,
      );
    }
  }

  private mockAnalysis(commentText: string): LlmAnalysisResult {
    const raw: JsonObject = {
      category: 'その他',
      sentiment: 'neutral',
      priority: 'low',
      fix_difficulty: 'easy',
      risk_level: 'none',
      is_safe: true,
      summary: commentText.slice(0, MOCK_SUMMARY_LENGTH),
      tags: [],
    };
    const result = normalizeAnalysisPayload(raw);
    return { ...result, warnings: [MOCK_PROVIDER_WARNING, ...result.warnings] };
  }

  private isChatCompletion(): boolean {
    return (
      this.config.provider === 'openai' ||
      this.config.provider === 'azure_openai'
    );
  }

  private buildUrl(): string {
    const url = new URL(this.config.baseUrl ?? '');
    if (this.config.provider === 'azure_openai' && this.config.apiVersion) {
      url.searchParams.set('api-version', this.config.apiVersion);
    }
    return url.toString();
  }

  private buildPayload(commentText: string, context: AnalysisContext): JsonObject {
    const prompt = buildPrompt(commentText, context);

    if (this.isChatCompletion()) {
      const payload: JsonObject = {
        model: this.config.model,
        messages: [{ role: 'user', content: prompt }],
      };
      if (this.config.enableResponseFormat) {
        payload.response_format = { type: 'json_object' };
      }
      return payload;
    }

    const payload: JsonObject = { comment: commentText, instructions: prompt };
    if (this.config.model) {
      payload.model = this.config.model;
    }
    return payload;
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      ...this.config.extraHeaders,
    };

    if (this.config.apiKey) {
      if (this.isChatCompletion()) {
        headers.Authorization = `Bearer ${this.config.apiKey}`;
      } else if (!('X-API-Key' in headers)) {
        headers['X-API-Key'] = this.config.apiKey;
      }
    }

    if (this.config.organization && this.config.provider === 'openai') {
      headers['OpenAI-Organization'] = this.config.organization;
    }

    return headers;
  }
}
