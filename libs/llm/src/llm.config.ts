import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import { z } from 'zod';
import { LlmClientConfig, LlmProvider } from './llm.types';

const logger = new Logger('LlmConfig');

const DEFAULT_TIMEOUT_MS = 15000;

const HeadersSchema = z.record(z.string(), z.string());

/**
 * Map the free-form LLM_PROVIDER setting onto a supported backend
 */
export function resolveProvider(value: string | undefined): LlmProvider {
  const provider = (value ?? 'mock').trim().toLowerCase();
  if (provider === '' || provider === 'mock' || provider === 'disabled') {
    return 'mock';
  }
  if (provider === 'openai' || provider === 'gpt') {
    return 'openai';
  }
  if (provider === 'azure' || provider === 'azure_openai') {
    return 'azure_openai';
  }
  return 'generic';
}

function parseExtraHeaders(value: string | undefined): Record<string, string> {
  if (!value || value.trim().length === 0) {
    return {};
  }
  try {
    const parsed = HeadersSchema.safeParse(JSON.parse(value));
    if (parsed.success) {
      return parsed.data;
    }
    logger.warn('LLM_EXTRA_HEADERS must be a JSON object of strings; ignoring it');
  } catch {
    logger.warn('LLM_EXTRA_HEADERS is not valid JSON; ignoring it');
  }
  return {};
}

function parseBoolean(value: string | boolean | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  if (typeof value === 'boolean') return value;
  return !['false', '0', 'no', 'off'].includes(value.trim().toLowerCase());
}

function optional(value: string | undefined): string | undefined {
  return value && value.trim().length > 0 ? value.trim() : undefined;
}

/**
 * Build the LLM client configuration from environment settings.
 *
 * @throws Error when a non-mock provider has no base URL or the timeout is not positive
 */
export function buildLlmConfig(configService: ConfigService): LlmClientConfig {
  const provider = resolveProvider(configService.get<string>('LLM_PROVIDER'));
  const timeoutMs = Number(
    configService.get<string | number>('LLM_TIMEOUT_MS') ?? DEFAULT_TIMEOUT_MS,
  );

  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new Error('LLM_TIMEOUT_MS must be a positive number');
  }

  const config: LlmClientConfig = {
    provider,
    baseUrl: optional(configService.get<string>('LLM_API_BASE')),
    model: optional(configService.get<string>('LLM_MODEL')),
    apiKey: optional(configService.get<string>('LLM_API_KEY')),
    apiVersion: optional(configService.get<string>('LLM_API_VERSION')),
    organization: optional(configService.get<string>('LLM_ORGANIZATION')),
    timeoutMs,
    extraHeaders: parseExtraHeaders(configService.get<string>('LLM_EXTRA_HEADERS')),
    enableResponseFormat: parseBoolean(
      configService.get<string | boolean>('LLM_RESPONSE_FORMAT'),
      true,
    ),
  };

  if (config.provider !== 'mock' && !config.baseUrl) {
    throw new Error(`LLM_API_BASE is required when LLM_PROVIDER is '${config.provider}'`);
  }

  return config;
}
