/**
 * Supported LLM backends
 */
export type LlmProvider = 'mock' | 'generic' | 'openai' | 'azure_openai';

export interface LlmClientConfig {
  provider: LlmProvider;
  baseUrl?: string;
  model?: string;
  apiKey?: string;
  apiVersion?: string;
  organization?: string;
  timeoutMs: number;
  extraHeaders: Record<string, string>;
  enableResponseFormat: boolean;
}

export type JsonObject = Record<string, unknown>;

/**
 * Optional prompt enrichment; never required for classification
 */
export interface AnalysisContext {
  courseName?: string;
  questionText?: string;
}

/**
 * Normalized analysis record. Every field the backend may omit is optional;
 * the comment classifier decides the fallbacks.
 */
export interface LlmAnalysisResult {
  category?: string;
  priority?: string;
  importanceScore?: number;
  fixDifficulty?: string;
  riskLevel?: string;
  sentiment?: string;
  isSafe?: boolean;
  summary?: string;
  tags: string[];
  raw: JsonObject;
  warnings: string[];
}

export interface HttpRequest {
  url: string;
  body: unknown;
  headers: Record<string, string>;
  timeoutMs: number;
}

export interface HttpResponse {
  status: number;
  body: string;
}

/**
 * HTTP client interface for dependency injection (testing)
 *
 * Implementations reject with an error named 'AbortError' when the
 * request exceeds timeoutMs.
 */
export interface HttpClient {
  post(request: HttpRequest): Promise<HttpResponse>;
}

/**
 * Injection token for the HTTP client used by LlmClientService
 */
export const LLM_HTTP_CLIENT = 'LLM_HTTP_CLIENT';
