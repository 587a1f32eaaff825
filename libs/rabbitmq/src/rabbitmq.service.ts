import {
  Injectable,
  OnModuleInit,
  OnModuleDestroy,
  Logger,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  ClientProxy,
  ClientProxyFactory,
  RmqRecordBuilder,
} from '@nestjs/microservices';
import { lastValueFrom } from 'rxjs';
import {
  CORRELATION_ID_HEADER,
  JobMessages,
  JobPattern,
  getErrorMessage,
} from '@app/shared-types';
import {
  QueueName,
  buildRabbitMqUrl,
  getQueueForPattern,
  getRoutedQueues,
  getSanitizedRabbitMqUrl,
} from './rabbitmq.constants';
import { buildRmqOptions } from './rabbitmq.options';

export interface EmitOptions {
  /** Sent as the `x-correlation-id` message header; the worker logs with it */
  correlationId?: string;
}

/**
 * Publisher for analysis-worker jobs
 *
 * Holds one client per routed queue. `emit` resolves once the broker has
 * accepted the message, so callers can mark a batch FAILED when it is not.
 */
@Injectable()
export class RabbitmqService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(RabbitmqService.name);
  private clients = new Map<QueueName, ClientProxy>();

  constructor(private readonly configService: ConfigService) {}

  async onModuleInit(): Promise<void> {
    const url = buildRabbitMqUrl(this.configService);
    this.logger.log(`Connecting publisher to ${getSanitizedRabbitMqUrl(url)}`);

    try {
      for (const queue of getRoutedQueues()) {
        const client = this.createClient(url, queue);
        await client.connect();
        this.clients.set(queue, client);
        this.logger.log(`Publishing to queue: ${queue}`);
      }
    } catch (error) {
      this.logger.error(
        `RabbitMQ publisher failed to connect: ${getErrorMessage(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw error;
    }
  }

  async onModuleDestroy(): Promise<void> {
    const closing = [...this.clients.entries()];
    this.clients.clear();

    const results = await Promise.allSettled(
      closing.map(([, client]) => client.close()),
    );
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        this.logger.warn(
          `Error closing client for ${closing[index][0]}: ${getErrorMessage(result.reason)}`,
        );
      }
    });
    this.logger.log('RabbitMQ publisher closed');
  }

  /**
   * Publish a job message to the queue its pattern routes to
   */
  async emit<P extends JobPattern>(
    pattern: P,
    data: JobMessages[P],
    options: EmitOptions = {},
  ): Promise<void> {
    const queue = getQueueForPattern(pattern);
    const client = this.clients.get(queue);
    if (!client) {
      throw new Error(`No client available for queue: ${queue}`);
    }

    const headers: Record<string, string> = {};
    if (options.correlationId) {
      headers[CORRELATION_ID_HEADER] = options.correlationId;
    }

    const record = new RmqRecordBuilder(data)
      .setOptions({ persistent: true, headers })
      .build();

    this.logger.debug(
      `[${options.correlationId ?? 'none'}] ${pattern} → ${queue}`,
    );
    await lastValueFrom(client.emit(pattern, record), {
      defaultValue: undefined,
    });
  }

  /**
   * Readiness: every routed queue has a connected client
   */
  healthCheck(): boolean {
    return this.isConnected();
  }

  isConnected(): boolean {
    return getRoutedQueues().every((queue) => this.clients.has(queue));
  }

  private createClient(url: string, queue: QueueName): ClientProxy {
    return ClientProxyFactory.create(buildRmqOptions(url, queue, 'publisher'));
  }
}
