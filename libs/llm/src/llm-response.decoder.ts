import { z } from 'zod';
import { JsonObject, LlmAnalysisResult } from './llm.types';

/**
 * Decoding outcome. Unwrapping never throws; the client turns a failed
 * decode into LlmResponseFormatError.
 */
export type DecodeResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: string };

const ok = <T>(value: T): DecodeResult<T> => ({ ok: true, value });
const fail = <T>(error: string): DecodeResult<T> => ({ ok: false, error });

const JsonObjectSchema = z.record(z.string(), z.unknown());

const ChatCompletionSchema = z.object({
  choices: z.array(z.unknown()),
});

const ChoiceSchema = z
  .object({
    message: z
      .object({ content: z.unknown().optional() })
      .passthrough()
      .nullish(),
    content: z.unknown().optional(),
  })
  .passthrough();

const ContentPartSchema = z.object({ text: z.string().optional() }).passthrough();

const ENVELOPE_KEYS = ['analysis', 'result', 'data'] as const;

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/**
 * Remove a surrounding Markdown code fence (with optional language tag)
 */
export function stripCodeFences(text: string): string {
  let result = text.trim();
  if (result.startsWith('```')) {
    const newline = result.indexOf('\n');
    result = newline === -1 ? '' : result.slice(newline + 1);
  }
  if (result.endsWith('```')) {
    result = result.slice(0, result.lastIndexOf('```'));
  }
  return result.trim();
}

function parseJsonObject(text: string, context: string): DecodeResult<JsonObject> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFences(text));
  } catch {
    return fail(`Failed to parse JSON content from ${context}`);
  }
  const object = JsonObjectSchema.safeParse(parsed);
  return object.success
    ? ok(object.data)
    : fail(`LLM response is not a JSON object: ${describe(parsed)}`);
}

function joinContentParts(parts: unknown[]): string {
  return parts
    .map((part) => {
      const parsed = ContentPartSchema.safeParse(part);
      return parsed.success ? (parsed.data.text ?? '') : '';
    })
    .join('')
    .trim();
}

function decodeChoices(choices: unknown[]): DecodeResult<JsonObject> {
  if (choices.length === 0) {
    return fail('LLM response choices array was empty');
  }

  const choice = ChoiceSchema.safeParse(choices[0] ?? {});
  if (!choice.success) {
    return fail('LLM response missing message content');
  }

  let content: unknown = choice.data.message?.content;
  if (content === undefined || content === null) {
    const direct = choice.data.content;
    if (Array.isArray(direct)) {
      const joined = joinContentParts(direct);
      content = joined.length > 0 ? joined : undefined;
    } else if (typeof direct === 'string') {
      content = direct;
    }
  }

  if (content === undefined || content === null) {
    return fail('LLM response missing message content');
  }
  if (typeof content === 'string') {
    return parseJsonObject(content, 'LLM choice');
  }
  if (Array.isArray(content)) {
    return parseJsonObject(joinContentParts(content), 'structured LLM messages');
  }

  const object = JsonObjectSchema.safeParse(content);
  return object.success
    ? ok(object.data)
    : fail(`Unsupported message content type: ${describe(content)}`);
}

/**
 * Unwrap a provider response body into the analysis object.
 *
 * Shapes are tried in order:
 * 1. `{analysis|result|data: {...}}` envelope
 * 2. chat completion `choices[0].message.content` (string, parts or object)
 * 3. the body itself as a bare object
 *
 * A top-level array is unwrapped to its first element.
 */
export function unwrapResponseBody(body: unknown): DecodeResult<JsonObject> {
  if (Array.isArray(body)) {
    return body.length > 0
      ? unwrapResponseBody(body[0])
      : fail('Unexpected LLM response structure: empty array');
  }

  const object = JsonObjectSchema.safeParse(body);
  if (!object.success) {
    return fail(`Unexpected LLM response structure: ${describe(body)}`);
  }

  for (const key of ENVELOPE_KEYS) {
    const inner = JsonObjectSchema.safeParse(object.data[key]);
    if (inner.success) {
      return ok(inner.data);
    }
  }

  const completion = ChatCompletionSchema.safeParse(object.data);
  if (completion.success) {
    return decodeChoices(completion.data.choices);
  }

  return ok(object.data);
}

// First alias present wins; the canonical name is listed first
const FIELD_ALIASES = {
  priority: ['priority', 'importance', 'importanceLevel', 'importance_level', 'importance_label'],
  importanceScore: ['importance_score', 'importanceScore'],
  fixDifficulty: ['fix_difficulty', 'fixDifficulty'],
  riskLevel: ['risk_level', 'riskLevel', 'danger_level', 'danger', 'risk_assessment', 'risk'],
  isSafe: ['is_safe', 'isSafe', 'safety', 'safe'],
} as const;

const TRUTHY_STRINGS = new Set(['true', '1', 'yes', 'safe']);

function pick(payload: JsonObject, aliases: readonly string[]): unknown {
  for (const alias of aliases) {
    if (alias in payload && payload[alias] !== null && payload[alias] !== undefined) {
      return payload[alias];
    }
  }
  return undefined;
}

function asText(value: unknown): string | undefined {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return undefined;
}

function asNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string' && value.trim().length > 0) {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function asBoolean(value: unknown): boolean | undefined {
  if (value === undefined) return undefined;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    return TRUTHY_STRINGS.has(value.trim().toLowerCase());
  }
  return Boolean(value);
}

/**
 * Fold provider-specific field names and value types into LlmAnalysisResult
 */
export function normalizeAnalysisPayload(payload: JsonObject): LlmAnalysisResult {
  const warnings: string[] = [];

  let tags: string[] = [];
  const rawTags = payload.tags;
  if (Array.isArray(rawTags)) {
    tags = rawTags
      .map((tag) => asText(tag))
      .filter((tag): tag is string => tag !== undefined);
  } else if (typeof rawTags === 'string') {
    tags = rawTags
      .split(',')
      .map((tag) => tag.trim())
      .filter((tag) => tag.length > 0);
  } else if (rawTags !== undefined && rawTags !== null) {
    warnings.push('tags field was not a list; dropping its value.');
  }

  const rawScore = pick(payload, FIELD_ALIASES.importanceScore);
  const importanceScore = asNumber(rawScore);
  if (rawScore !== undefined && importanceScore === undefined) {
    warnings.push('importance_score was not numeric; ignoring it.');
  }

  return {
    category: asText(payload.category),
    priority: asText(pick(payload, FIELD_ALIASES.priority)),
    importanceScore,
    fixDifficulty: asText(pick(payload, FIELD_ALIASES.fixDifficulty)),
    riskLevel: asText(pick(payload, FIELD_ALIASES.riskLevel)),
    sentiment: asText(payload.sentiment),
    isSafe: asBoolean(pick(payload, FIELD_ALIASES.isSafe)),
    summary: asText(payload.summary),
    tags,
    raw: payload,
    warnings,
  };
}
