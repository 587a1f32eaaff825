/**
 * RabbitMQ Application Constants
 *
 * Queue names and routing are part of the messaging design, not deployment
 * configuration, so they live here rather than in environment variables.
 */

import { ConfigService } from '@nestjs/config';
import { JobPattern, MESSAGE_PATTERNS } from '@app/shared-types';

export const RABBITMQ_CONSTANTS = {
  QUEUES: {
    ANALYSIS: 'feedback_analysis_queue',
  },

  DEFAULTS: {
    // One batch at a time per worker; a batch already fans out to the LLM
    PREFETCH_COUNT: 1,
    QUEUE_DURABLE: true,
    NO_ACK: false,
  },
} as const;

export type QueueName =
  (typeof RABBITMQ_CONSTANTS.QUEUES)[keyof typeof RABBITMQ_CONSTANTS.QUEUES];

const PATTERN_QUEUES: Record<JobPattern, QueueName> = {
  [MESSAGE_PATTERNS.UPLOAD_PROCESS]: RABBITMQ_CONSTANTS.QUEUES.ANALYSIS,
  [MESSAGE_PATTERNS.SUMMARY_RECOMPUTE]: RABBITMQ_CONSTANTS.QUEUES.ANALYSIS,
};

export function isJobPattern(pattern: string): pattern is JobPattern {
  return Object.prototype.hasOwnProperty.call(PATTERN_QUEUES, pattern);
}

/**
 * Resolve the queue that consumes a message pattern
 */
export function getQueueForPattern(pattern: string): QueueName {
  if (!isJobPattern(pattern)) {
    throw new Error(`No queue configured for pattern: ${pattern}`);
  }
  return PATTERN_QUEUES[pattern];
}

/**
 * Distinct queues that receive at least one pattern
 */
export function getRoutedQueues(): QueueName[] {
  return [...new Set(Object.values(PATTERN_QUEUES))];
}

/**
 * AMQP URL shared by the gateway publisher and the worker consumer
 */
export function buildRabbitMqUrl(configService: ConfigService): string {
  const host = configService.get<string>('RABBITMQ_HOST', 'localhost');
  const port = configService.get<number>('RABBITMQ_PORT', 5672);
  const user = configService.get<string>('RABBITMQ_USER', 'guest');
  const password = configService.get<string>('RABBITMQ_PASSWORD', 'guest');
  const vhost = configService.get<string>('RABBITMQ_VHOST', '/');

  const encodedVhost = vhost === '/' ? '' : `/${encodeURIComponent(vhost)}`;

  return `amqp://${encodeURIComponent(user)}:${encodeURIComponent(password)}@${host}:${port}${encodedVhost}`;
}

/**
 * URL with the password masked, for logs
 */
export function getSanitizedRabbitMqUrl(url: string): string {
  return url.replace(/(:\/\/[^:]+:)[^@]+(@)/, '$1****$2');
}
