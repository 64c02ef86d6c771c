import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  SQSClient,
  ReceiveMessageCommand,
  DeleteMessageCommand,
  SendMessageCommand,
  Message,
} from '@aws-sdk/client-sqs';
import type { AppConfig } from '../../../config/configuration';
import type { SqsMessageEnvelope, SqsSendResult } from '../interfaces/sqs-message.interface';
import { PinoLoggerService } from '../../logging/pino-logger.service';

@Injectable()
export class SqsService implements OnModuleDestroy {
  private readonly client: SQSClient;
  private readonly maxMessages: number;
  private readonly waitTimeSeconds: number;
  private readonly visibilityTimeout: number;

  constructor(
    private readonly configService: ConfigService<AppConfig>,
    private readonly logger: PinoLoggerService,
  ) {
    const awsConfig = this.configService.getOrThrow('aws', { infer: true });
    const sqsConfig = this.configService.getOrThrow('sqs', { infer: true });

    this.client = new SQSClient({
      region: awsConfig.region,
      ...(awsConfig.endpoint && { endpoint: awsConfig.endpoint }),
      ...(awsConfig.credentials && { credentials: awsConfig.credentials }),
    });

    this.maxMessages = sqsConfig.maxMessages;
    this.waitTimeSeconds = sqsConfig.waitTimeSeconds;
    this.visibilityTimeout = sqsConfig.visibilityTimeout;
  }

  async receiveMessages(queueUrl: string, maxMessages?: number): Promise<SqsMessageEnvelope[]> {
    const command = new ReceiveMessageCommand({
      QueueUrl: queueUrl,
      MaxNumberOfMessages: maxMessages ?? this.maxMessages,
      WaitTimeSeconds: this.waitTimeSeconds,
      VisibilityTimeout: this.visibilityTimeout,
      MessageSystemAttributeNames: ['ApproximateReceiveCount'],
      MessageAttributeNames: ['All'],
    });

    const response = await this.client.send(command);

    if (!response.Messages || response.Messages.length === 0) {
      return [];
    }

    const envelopes: SqsMessageEnvelope[] = [];
    for (const message of response.Messages) {
      if (!message.MessageId || !message.ReceiptHandle) {
        this.logger.warn({ queueUrl }, 'Received SQS message without id or receipt handle');
        continue;
      }

      envelopes.push({
        body: this.parseBody(message),
        receiptHandle: message.ReceiptHandle,
        messageId: message.MessageId,
        approximateReceiveCount: parseInt(
          message.Attributes?.ApproximateReceiveCount || '1',
          10,
        ),
      });
    }

    return envelopes;
  }

  async deleteMessage(queueUrl: string, receiptHandle: string): Promise<void> {
    await this.client.send(
      new DeleteMessageCommand({
        QueueUrl: queueUrl,
        ReceiptHandle: receiptHandle,
      }),
    );
  }

  async sendMessage<T>(queueUrl: string, body: T): Promise<SqsSendResult> {
    const command = new SendMessageCommand({
      QueueUrl: queueUrl,
      MessageBody: JSON.stringify(body),
    });

    const response = await this.client.send(command);

    return {
      messageId: response.MessageId ?? '',
      sequenceNumber: response.SequenceNumber,
    };
  }

  private parseBody(message: Message): unknown {
    try {
      return JSON.parse(message.Body || '{}');
    } catch {
      this.logger.warn(
        { messageId: message.MessageId },
        'Failed to parse message body as JSON',
      );
      return message.Body;
    }
  }

  onModuleDestroy() {
    this.client.destroy();
  }
}
