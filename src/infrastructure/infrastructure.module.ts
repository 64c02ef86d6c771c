import { Module } from '@nestjs/common';
import { ConfigModule } from '../config/config.module';

// Shared services (existing infrastructure)
import { SqsModule } from '../shared/aws/sqs/sqs.module';
import { LoggingModule } from '../shared/logging/logging.module';

// Injection tokens (string symbols for DI)
import {
  HASH_TOOL_PORT,
  MESSAGE_QUEUE_PORT,
  OUTPUT_FILE_STORAGE_PORT,
  TASK_RESULT_CODEC_PORT,
} from '../application/ports/output';

// Adapters (implementations)
import { SsdeepProcessAdapter } from './adapters/hashing/ssdeep-process.adapter';
import { LocalOutputFileStorageAdapter } from './adapters/storage/local-output-file-storage.adapter';
import { Base64TaskResultCodec } from './adapters/codec/base64-task-result.codec';
import { SqsMessageQueueAdapter } from './adapters/messaging/sqs-message-queue.adapter';

/**
 * Infrastructure Module
 * Provides implementations (adapters) for all output ports
 */
@Module({
  imports: [ConfigModule, LoggingModule, SqsModule],
  providers: [
    // Hashing adapter
    {
      provide: HASH_TOOL_PORT,
      useClass: SsdeepProcessAdapter,
    },

    // Storage adapter
    {
      provide: OUTPUT_FILE_STORAGE_PORT,
      useClass: LocalOutputFileStorageAdapter,
    },

    // Result codec
    {
      provide: TASK_RESULT_CODEC_PORT,
      useClass: Base64TaskResultCodec,
    },

    // Messaging adapter
    {
      provide: MESSAGE_QUEUE_PORT,
      useClass: SqsMessageQueueAdapter,
    },
  ],
  exports: [
    HASH_TOOL_PORT,
    OUTPUT_FILE_STORAGE_PORT,
    TASK_RESULT_CODEC_PORT,
    MESSAGE_QUEUE_PORT,
  ],
})
export class InfrastructureModule {}
