import type { JobPattern } from './message-types';

/**
 * Routing keys of the messages the gateway publishes for the analysis worker
 */
export const MESSAGE_PATTERNS = {
  UPLOAD_PROCESS: 'upload.process',
  SUMMARY_RECOMPUTE: 'summary.recompute',
} as const satisfies Record<string, JobPattern>;

export type MessagePattern =
  (typeof MESSAGE_PATTERNS)[keyof typeof MESSAGE_PATTERNS];
