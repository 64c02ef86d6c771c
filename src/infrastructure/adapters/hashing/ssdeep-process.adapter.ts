import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { spawn } from 'child_process';
import type { AppConfig } from '../../../config/configuration';
import type { HashToolOutput, HashToolPort } from '../../../application/ports/output';
import {
  SPAWN_FAILURE_STATUS,
  SSDEEP_FLAGS,
  TIMEOUT_STATUS,
} from '../../../domain/value-objects/hash-outcome.vo';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';

/**
 * SSDeep Process Adapter
 * Implements HashToolPort by spawning `ssdeep -s -b <path>` and collecting
 * its output. The promise always resolves: spawn failures and timeouts are
 * reported as a non-zero status.
 */
@Injectable()
export class SsdeepProcessAdapter implements HashToolPort {
  private readonly binary: string;
  private readonly timeoutMs: number;

  constructor(
    private readonly configService: ConfigService<AppConfig>,
    private readonly logger: PinoLoggerService,
  ) {
    const ssdeepConfig = this.configService.getOrThrow('ssdeep', { infer: true });
    this.binary = ssdeepConfig.binary;
    this.timeoutMs = ssdeepConfig.timeoutMs;
  }

  run(path: string): Promise<HashToolOutput> {
    return new Promise((resolve) => {
      let stdout = '';
      let stderr = '';
      let settled = false;
      let timer: NodeJS.Timeout | undefined;

      const finish = (output: HashToolOutput) => {
        if (settled) {
          return;
        }
        settled = true;
        if (timer) {
          clearTimeout(timer);
        }
        resolve(output);
      };

      this.logger.debug({ binary: this.binary, path }, 'Running ssdeep');

      const child = spawn(this.binary, [...SSDEEP_FLAGS, path], {
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      child.stdout.setEncoding('utf8');
      child.stderr.setEncoding('utf8');
      child.stdout.on('data', (chunk: string) => {
        stdout += chunk;
      });
      child.stderr.on('data', (chunk: string) => {
        stderr += chunk;
      });

      if (this.timeoutMs > 0) {
        timer = setTimeout(() => {
          child.kill('SIGKILL');
          // Processes forked by the binary may still hold the pipes open
          child.stdout.destroy();
          child.stderr.destroy();
          finish({
            status: TIMEOUT_STATUS,
            stdout,
            stderr: `ssdeep timed out after ${this.timeoutMs}ms`,
          });
        }, this.timeoutMs);
      }

      child.on('error', (error) => {
        this.logger.error({ binary: this.binary, path, error: error.message }, 'Failed to run ssdeep');
        finish({ status: SPAWN_FAILURE_STATUS, stdout, stderr: error.message });
      });

      child.on('close', (code, signal) => {
        if (code === null) {
          finish({ status: 1, stdout, stderr: stderr || `ssdeep terminated by ${signal}` });
          return;
        }

        finish({ status: code, stdout, stderr });
      });
    });
  }
}
