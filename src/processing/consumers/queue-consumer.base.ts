import { OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import type { MessageQueuePort, QueueMessage } from '../../application/ports/output';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';

export interface QueueConsumerConfig {
  queueUrl: string;
  batchSize?: number;
}

/**
 * Long-polling consumer loop. Messages are deleted once `processMessage`
 * resolves; a rejection leaves them to `handleProcessingError`.
 */
export abstract class QueueConsumerBase implements OnModuleInit, OnModuleDestroy {
  private isRunning = false;
  private isShuttingDown = false;
  private loopPromise: Promise<void> | null = null;

  protected readonly batchSize: number;
  protected readonly queueUrl: string;

  constructor(
    protected readonly messageQueue: MessageQueuePort,
    protected readonly logger: PinoLoggerService,
    config: QueueConsumerConfig,
  ) {
    this.queueUrl = config.queueUrl;
    this.batchSize = config.batchSize ?? 10;
  }

  async onModuleInit(): Promise<void> {
    this.start();
  }

  async onModuleDestroy(): Promise<void> {
    await this.stop();
  }

  start(): void {
    if (this.isRunning) {
      return;
    }

    this.isRunning = true;
    this.isShuttingDown = false;
    this.logger.info({ queueUrl: this.queueUrl }, 'Starting queue consumer');
    this.loopPromise = this.poll();
  }

  async stop(): Promise<void> {
    if (!this.isRunning) {
      return;
    }

    this.logger.info({ queueUrl: this.queueUrl }, 'Stopping queue consumer');
    this.isShuttingDown = true;
    this.isRunning = false;

    // Let the in-flight batch finish
    if (this.loopPromise) {
      await this.loopPromise;
      this.loopPromise = null;
    }
  }

  /**
   * Receive and process one batch. Returns the number of messages received.
   */
  async pollOnce(): Promise<number> {
    const messages = await this.messageQueue.receiveMessages(this.queueUrl, this.batchSize);

    if (messages.length === 0) {
      return 0;
    }

    this.logger.debug({ count: messages.length, queueUrl: this.queueUrl }, 'Received messages');

    // Each message is an independent batch
    await Promise.all(messages.map((message) => this.handleMessage(message)));

    return messages.length;
  }

  private async poll(): Promise<void> {
    while (this.isRunning && !this.isShuttingDown) {
      try {
        await this.pollOnce();
      } catch (error) {
        this.logger.error(
          { error: error instanceof Error ? error.message : String(error), queueUrl: this.queueUrl },
          'Error in polling loop',
        );
        // Back off on error
        await this.delay(5000);
      }
    }
  }

  private async handleMessage(message: QueueMessage): Promise<void> {
    const { messageId, receiptHandle } = message;

    try {
      this.logger.debug({ messageId }, 'Processing message');

      await this.processMessage(message);

      await this.messageQueue.deleteMessage(this.queueUrl, receiptHandle);

      this.logger.debug({ messageId }, 'Message processed successfully');
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      this.logger.error({ error: failure.message, messageId }, 'Error processing message');

      await this.handleProcessingError(message, failure);
    }
  }

  /**
   * Override this to implement message processing logic
   */
  protected abstract processMessage(message: QueueMessage): Promise<void>;

  /**
   * Override this to implement custom error handling
   */
  protected async handleProcessingError(message: QueueMessage, error: Error): Promise<void> {
    // Default: leave the message for redelivery after the visibility timeout
    this.logger.warn(
      {
        messageId: message.messageId,
        receiveCount: message.approximateReceiveCount,
        error: error.message,
      },
      'Message processing failed, will retry',
    );
  }

  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
