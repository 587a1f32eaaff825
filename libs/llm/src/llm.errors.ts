import { TransientError } from '@app/shared-types';

/**
 * Base error for LLM backend failures: transport problems and non-2xx replies.
 * The client never retries; the classifier turns these into fallback results.
 */
export class LlmClientError extends TransientError {}

export class LlmTimeoutError extends LlmClientError {}

/**
 * The backend answered, but not with a JSON object we can read
 */
export class LlmResponseFormatError extends LlmClientError {}
