import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import type { AppConfig } from './config/configuration';
import { PinoLoggerService } from './shared/logging/pino-logger.service';
import { SSDEEP_TASK_METADATA, SSDEEP_TASK_NAME } from './processing/task-metadata';

/**
 * Bootstrap the worker
 * Queue consumer only (no HTTP server)
 */
async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
  });

  const configService = app.get(ConfigService<AppConfig>);
  const logger = app.get(PinoLoggerService);

  app.useLogger(logger);
  logger.setContext('Bootstrap');

  const nodeEnv = configService.get('nodeEnv', { infer: true });
  const sqsConfig = configService.getOrThrow('sqs', { infer: true });
  const ssdeepConfig = configService.getOrThrow('ssdeep', { infer: true });

  app.enableShutdownHooks();

  const shutdownHandler = async (signal: string) => {
    logger.info({ signal }, 'Received shutdown signal, stopping consumer...');
    await app.close();
    logger.info({ signal }, 'Consumer stopped, worker shut down gracefully');
    process.exit(0);
  };

  process.on('SIGTERM', () => {
    shutdownHandler('SIGTERM').catch((error: unknown) => {
      logger.error({ error: String(error) }, 'Shutdown failed');
      process.exit(1);
    });
  });
  process.on('SIGINT', () => {
    shutdownHandler('SIGINT').catch((error: unknown) => {
      logger.error({ error: String(error) }, 'Shutdown failed');
      process.exit(1);
    });
  });

  process.on('uncaughtException', (error) => {
    logger.error({ error: error.message, stack: error.stack }, 'Uncaught exception');
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error({ reason: String(reason) }, 'Unhandled rejection');
    process.exit(1);
  });

  logger.info(
    {
      nodeEnv,
      pid: process.pid,
      task: SSDEEP_TASK_NAME,
      displayName: SSDEEP_TASK_METADATA.display_name,
      ssdeep: ssdeepConfig.binary,
      queues: {
        tasks: sqsConfig.tasksUrl,
        results: sqsConfig.resultsUrl,
      },
    },
    'SSDeep hash worker started - listening to SQS queue',
  );
}

bootstrap().catch((error) => {
  console.error('Failed to start worker:', error);
  process.exit(1);
});
