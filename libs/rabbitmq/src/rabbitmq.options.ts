import { RmqOptions, Transport } from '@nestjs/microservices';
import { QueueName, RABBITMQ_CONSTANTS } from './rabbitmq.constants';

/**
 * Transport options for one queue. Publishers only assert the queue;
 * the consumer also takes manual acks and a prefetch window.
 */
export function buildRmqOptions(
  url: string,
  queue: QueueName,
  role: 'publisher' | 'consumer',
): RmqOptions {
  const options: NonNullable<RmqOptions['options']> = {
    urls: [url],
    queue,
    queueOptions: { durable: RABBITMQ_CONSTANTS.DEFAULTS.QUEUE_DURABLE },
  };
  if (role === 'consumer') {
    return {
      transport: Transport.RMQ,
      options: {
        ...options,
        noAck: RABBITMQ_CONSTANTS.DEFAULTS.NO_ACK,
        prefetchCount: RABBITMQ_CONSTANTS.DEFAULTS.PREFETCH_COUNT,
      },
    };
  }
  return { transport: Transport.RMQ, options };
}
