/**
 * Application Configuration
 *
 * Loads and validates environment variables and exposes them as a typed
 * {@link AppConfig} through `ConfigService<AppConfig>`.
 *
 * ## Usage:
 * ```typescript
 * constructor(private configService: ConfigService<AppConfig>) {}
 *
 * const binary = this.configService.get('ssdeep.binary', { infer: true });
 * ```
 *
 * @module Configuration
 */

import { validateEnv, EnvConfig } from './validation.schema';

export interface AppConfig {
  nodeEnv: string;
  logLevel: string;
  aws: {
    region: string;
    endpoint?: string;
    credentials?: {
      accessKeyId: string;
      secretAccessKey: string;
    };
  };
  sqs: {
    tasksUrl: string;
    resultsUrl: string;
    maxMessages: number;
    waitTimeSeconds: number;
    visibilityTimeout: number;
    /**
     * Receives after which a message that keeps failing is dropped
     * instead of being returned to the queue.
     */
    maxReceiveCount: number;
  };
  /**
   * External hashing tool.
   *
   * ### binary (Environment: SSDEEP_BINARY)
   * - Executable name resolved through `PATH`, or an absolute path
   * - Always invoked as `<binary> -s -b <file>`
   *
   * ### timeoutMs (Environment: SSDEEP_TIMEOUT_MS)
   * - Per-file limit for one invocation, `0` waits for the process indefinitely
   * - A run that exceeds it is killed and recorded in the file's artifact as
   *   `Error running ssdeep (code 124): ...`
   */
  ssdeep: {
    binary: string;
    timeoutMs: number;
  };
  output: {
    /** Directory used when a task message carries no `outputPath` */
    basePath: string;
  };
}

export default (): AppConfig => {
  const env: EnvConfig = validateEnv(process.env);

  const config: AppConfig = {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    aws: {
      region: env.AWS_REGION,
      endpoint: env.AWS_ENDPOINT,
    },
    sqs: {
      tasksUrl: env.SQS_TASKS_URL,
      resultsUrl: env.SQS_RESULTS_URL,
      maxMessages: env.SQS_MAX_MESSAGES,
      waitTimeSeconds: env.SQS_WAIT_TIME_SECONDS,
      visibilityTimeout: env.SQS_VISIBILITY_TIMEOUT,
      maxReceiveCount: env.SQS_MAX_RECEIVE_COUNT,
    },
    ssdeep: {
      binary: env.SSDEEP_BINARY,
      timeoutMs: env.SSDEEP_TIMEOUT_MS,
    },
    output: {
      basePath: env.OUTPUT_BASE_PATH,
    },
  };

  // Add AWS credentials only if explicitly provided
  if (env.AWS_ACCESS_KEY_ID && env.AWS_SECRET_ACCESS_KEY) {
    config.aws.credentials = {
      accessKeyId: env.AWS_ACCESS_KEY_ID,
      secretAccessKey: env.AWS_SECRET_ACCESS_KEY,
    };
  }

  return config;
};
