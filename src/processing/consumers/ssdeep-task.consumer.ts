import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { join } from 'path';
import type { AppConfig } from '../../config/configuration';
import { MESSAGE_QUEUE_PORT, TASK_RESULT_CODEC_PORT } from '../../application/ports/output';
import type {
  MessageQueuePort,
  QueueMessage,
  TaskResultCodecPort,
} from '../../application/ports/output';
import { CalculateSsdeepHashesUseCase } from '../../application/use-cases';
import { TaskMessageError } from '../../domain';
import type { SsdeepTaskResultMessage } from '../../shared/interfaces/task-message.interface';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';
import { SsdeepTaskMessageDto, validateSsdeepTaskMessage } from '../dto/ssdeep-task.dto';
import { SSDEEP_TASK_NAME } from '../task-metadata';
import { QueueConsumerBase } from './queue-consumer.base';

/**
 * SSDeep Task Consumer
 * Takes hashing tasks off the tasks queue, runs the batch and publishes the
 * encoded result to the results queue
 */
@Injectable()
export class SsdeepTaskConsumer extends QueueConsumerBase {
  private readonly resultsQueueUrl: string;
  private readonly maxReceiveCount: number;
  private readonly outputBasePath: string;

  constructor(
    @Inject(MESSAGE_QUEUE_PORT)
    messageQueue: MessageQueuePort,
    logger: PinoLoggerService,
    configService: ConfigService<AppConfig>,
    private readonly calculateHashes: CalculateSsdeepHashesUseCase,
    @Inject(TASK_RESULT_CODEC_PORT)
    private readonly codec: TaskResultCodecPort,
  ) {
    const sqsConfig = configService.getOrThrow('sqs', { infer: true });

    super(messageQueue, logger, {
      queueUrl: sqsConfig.tasksUrl,
      batchSize: sqsConfig.maxMessages,
    });

    this.resultsQueueUrl = sqsConfig.resultsUrl;
    this.maxReceiveCount = sqsConfig.maxReceiveCount;
    this.outputBasePath = configService.getOrThrow('output', { infer: true }).basePath;
  }

  protected async processMessage(message: QueueMessage): Promise<void> {
    const { messageId } = message;

    let task: SsdeepTaskMessageDto;
    try {
      task = validateSsdeepTaskMessage(message.body);
    } catch (error) {
      if (error instanceof TaskMessageError) {
        this.logger.error(
          { messageId, error: error.message, ...error.context },
          'Invalid ssdeep task message',
        );
        // Return without throwing to delete invalid message
        return;
      }
      throw error;
    }

    const { taskId } = task;
    const taskLogger = task.workflowId
      ? this.logger.withTaskId(taskId).withWorkflowId(task.workflowId)
      : this.logger.withTaskId(taskId);
    const outputPath = task.outputPath ?? join(this.outputBasePath, taskId);

    taskLogger.info(
      { messageId, outputPath, piped: Boolean(task.pipeResult) },
      'Processing ssdeep task',
    );

    const result = await this.calculateHashes.execute(
      {
        pipeResult: task.pipeResult,
        inputFiles: task.inputFiles,
        outputPath,
        workflowId: task.workflowId,
        taskConfig: task.taskConfig,
      },
      taskLogger,
    );

    const resultMessage: SsdeepTaskResultMessage = {
      taskId,
      taskName: SSDEEP_TASK_NAME,
      workflowId: result.workflow_id,
      result: this.codec.encode(result),
    };
    await this.messageQueue.sendMessage(this.resultsQueueUrl, resultMessage);

    taskLogger.info(
      { outputCount: result.output_files.length, command: result.command },
      'SSDeep task completed',
    );
  }

  protected async handleProcessingError(message: QueueMessage, error: Error): Promise<void> {
    if (message.approximateReceiveCount < this.maxReceiveCount) {
      await super.handleProcessingError(message, error);
      return;
    }

    this.logger.error(
      {
        messageId: message.messageId,
        receiveCount: message.approximateReceiveCount,
        error: error.message,
      },
      'Max retries exceeded for ssdeep task, dropping message',
    );

    // Don't retry - delete the message
    await this.messageQueue.deleteMessage(this.queueUrl, message.receiptHandle);
  }
}
