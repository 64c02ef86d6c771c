import type { InputFileDescriptor } from '../../../domain/value-objects/input-file.vo';
import type { BatchResult } from '../output/task-result-codec.port';
import type { PinoLoggerService } from '../../../shared/logging/pino-logger.service';

/**
 * Calculate SSDeep Hashes Command
 */
export interface CalculateSsdeepHashesCommand {
  /** Encoded result of the previous stage; takes precedence over `inputFiles` */
  pipeResult?: string | null;
  inputFiles?: InputFileDescriptor[] | null;
  outputPath: string;
  workflowId?: string | null;
  /** Accepted for interface parity; the task has no configurable options */
  taskConfig?: Record<string, unknown> | null;
}

/**
 * Calculate SSDeep Hashes Port (Driving Port / Use Case Interface)
 * Hashes every input file and writes one artifact per file
 */
export interface CalculateSsdeepHashesPort {
  /**
   * Execute the batch. Per-file failures are written into artifacts;
   * only storage or decoding faults reject.
   */
  execute(command: CalculateSsdeepHashesCommand, logger?: PinoLoggerService): Promise<BatchResult>;
}
