import { Injectable } from '@nestjs/common';
import type { MessageQueuePort, QueueMessage } from '../../../application/ports/output/message-queue.port';
import { SqsService } from '../../../shared/aws/sqs/sqs.service';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';

/**
 * SQS Message Queue Adapter
 * Implements MessageQueuePort on top of SqsService
 */
@Injectable()
export class SqsMessageQueueAdapter implements MessageQueuePort {
  constructor(
    private readonly sqsService: SqsService,
    private readonly logger: PinoLoggerService,
  ) {}

  async sendMessage<T>(queueUrl: string, message: T): Promise<string> {
    this.logger.debug({ queueUrl }, 'Sending message to queue');

    const result = await this.sqsService.sendMessage(queueUrl, message);

    return result.messageId;
  }

  async receiveMessages(queueUrl: string, maxMessages?: number): Promise<QueueMessage[]> {
    const envelopes = await this.sqsService.receiveMessages(queueUrl, maxMessages);

    return envelopes.map((envelope) => ({
      messageId: envelope.messageId,
      body: envelope.body,
      receiptHandle: envelope.receiptHandle,
      approximateReceiveCount: envelope.approximateReceiveCount,
    }));
  }

  async deleteMessage(queueUrl: string, receiptHandle: string): Promise<void> {
    await this.sqsService.deleteMessage(queueUrl, receiptHandle);
  }
}
