import { Controller, Logger } from '@nestjs/common';
import { Ctx, EventPattern, Payload, RmqContext } from '@nestjs/microservices';
import type { Channel, Message } from 'amqplib';
import {
  CORRELATION_ID_HEADER,
  JobFailedError,
  MESSAGE_PATTERNS,
  getErrorMessage,
  isPermanentError,
  isTransientError,
} from '@app/shared-types';
import type {
  ProcessUploadMessage,
  RecomputeSummaryMessage,
} from '@app/shared-types';
import { JobRunnerService } from './jobs';
import { SummaryAggregatorService } from './summary';

@Controller()
export class AnalysisController {
  private readonly logger = new Logger(AnalysisController.name);

  constructor(
    private readonly jobRunner: JobRunnerService,
    private readonly aggregator: SummaryAggregatorService,
  ) {}

  /**
   * Gateway -> RabbitMQ ('upload.process') -> Analysis (this handler)
   */
  @EventPattern(MESSAGE_PATTERNS.UPLOAD_PROCESS)
  async handleUploadProcess(
    @Payload() data: ProcessUploadMessage,
    @Ctx() context: RmqContext,
  ): Promise<void> {
    await this.consume(
      MESSAGE_PATTERNS.UPLOAD_PROCESS,
      data,
      context,
      (batchId, correlationId) => this.jobRunner.run(batchId, correlationId),
    );
  }

  @EventPattern(MESSAGE_PATTERNS.SUMMARY_RECOMPUTE)
  async handleSummaryRecompute(
    @Payload() data: RecomputeSummaryMessage,
    @Ctx() context: RmqContext,
  ): Promise<void> {
    await this.consume(
      MESSAGE_PATTERNS.SUMMARY_RECOMPUTE,
      data,
      context,
      (batchId, correlationId) => this.aggregator.recompute(batchId, correlationId),
    );
  }

  /**
   * Run a batch handler and settle the message:
   * - handled or recorded as FAILED -> ack
   * - transient failure -> nack and requeue
   * - permanent failure -> nack and discard
   */
  private async consume(
    pattern: string,
    data: { batchId?: unknown } | null | undefined,
    context: RmqContext,
    handler: (batchId: string, correlationId: string) => Promise<unknown>,
  ): Promise<void> {
    const channel: Channel = context.getChannelRef();
    const originalMsg = context.getMessage() as Message;

    const batchId = typeof data?.batchId === 'string' ? data.batchId : undefined;
    const headerId: unknown =
      originalMsg.properties?.headers?.[CORRELATION_ID_HEADER];
    const correlationId =
      (typeof headerId === 'string' && headerId) || batchId || 'unknown';

    this.logger.log(`[${correlationId}] Received ${pattern}`);

    if (!batchId) {
      this.logger.error(`[${correlationId}] Invalid message: missing batchId`);
      // Acknowledge invalid messages to prevent requeue loop
      channel.ack(originalMsg);
      return;
    }

    try {
      await handler(batchId, correlationId);
      channel.ack(originalMsg);
      this.logger.log(`[${correlationId}] Message acknowledged successfully`);
    } catch (error) {
      if (error instanceof JobFailedError) {
        // Already recorded on the batch row
        this.logger.warn(`[${correlationId}] ${error.message}`);
        channel.ack(originalMsg);
        return;
      }

      this.logger.error(
        `[${correlationId}] Error processing message: ${getErrorMessage(error)}`,
        error instanceof Error ? error.stack : undefined,
      );

      if (isPermanentError(error)) {
        this.logger.error(`[${correlationId}] Discarding message (no requeue)`);
        channel.nack(originalMsg, false, false);
      } else {
        const reason = isTransientError(error) ? 'transient' : 'unclassified';
        this.logger.warn(
          `[${correlationId}] Requeuing message for retry (${reason} failure)`,
        );
        channel.nack(originalMsg, false, true);
      }
    }
  }
}
