import { Injectable, LoggerService } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import pino, { Logger } from 'pino';
import type { AppConfig } from '../../config/configuration';

type LogFields = Record<string, unknown>;

@Injectable()
export class PinoLoggerService implements LoggerService {
  private logger: Logger;
  private context?: string;

  constructor(private readonly configService: ConfigService<AppConfig>) {
    const logLevel = this.configService.get('logLevel', { infer: true }) || 'info';
    const nodeEnv = this.configService.get('nodeEnv', { infer: true });

    this.logger = pino({
      level: logLevel,
      ...(nodeEnv === 'development' && {
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        },
      }),
      formatters: {
        level: (label) => ({ level: label }),
      },
      base: {
        service: 'ssdeep-hash-worker',
        env: nodeEnv,
      },
    });
  }

  setContext(context: string): void {
    this.context = context;
  }

  private fields(extra?: LogFields, context?: string): LogFields {
    return { ...extra, context: context || this.context };
  }

  /** Nest `LoggerService` entry point, used for framework messages. */
  log(message: string, context?: string): void {
    this.logger.info(this.fields(undefined, context), message);
  }

  info(message: string): void;
  info(obj: LogFields, message: string): void;
  info(objOrMessage: LogFields | string, message?: string): void {
    if (typeof objOrMessage === 'string') {
      this.logger.info(this.fields(), objOrMessage);
    } else {
      this.logger.info(this.fields(objOrMessage), message || '');
    }
  }

  error(message: string, trace?: string, context?: string): void;
  error(obj: LogFields, message: string): void;
  error(objOrMessage: LogFields | string, traceOrMessage?: string, context?: string): void {
    if (typeof objOrMessage === 'string') {
      this.logger.error(
        this.fields(traceOrMessage ? { trace: traceOrMessage } : undefined, context),
        objOrMessage,
      );
    } else {
      this.logger.error(this.fields(objOrMessage), traceOrMessage || '');
    }
  }

  warn(message: string, context?: string): void;
  warn(obj: LogFields, message: string): void;
  warn(objOrMessage: LogFields | string, messageOrContext?: string): void {
    if (typeof objOrMessage === 'string') {
      this.logger.warn(this.fields(undefined, messageOrContext), objOrMessage);
    } else {
      this.logger.warn(this.fields(objOrMessage), messageOrContext || '');
    }
  }

  debug(message: string, context?: string): void;
  debug(obj: LogFields, message: string): void;
  debug(objOrMessage: LogFields | string, messageOrContext?: string): void {
    if (typeof objOrMessage === 'string') {
      this.logger.debug(this.fields(undefined, messageOrContext), objOrMessage);
    } else {
      this.logger.debug(this.fields(objOrMessage), messageOrContext || '');
    }
  }

  verbose(message: string, context?: string): void {
    this.logger.trace(this.fields(undefined, context), message);
  }

  child(bindings: LogFields): PinoLoggerService {
    const childLogger: PinoLoggerService = Object.create(this);
    childLogger.logger = this.logger.child(bindings);
    return childLogger;
  }

  withTaskId(taskId: string): PinoLoggerService {
    return this.child({ taskId });
  }

  withWorkflowId(workflowId: string): PinoLoggerService {
    return this.child({ workflowId });
  }
}
