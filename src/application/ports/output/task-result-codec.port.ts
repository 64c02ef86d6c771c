import type { InputFileDescriptor } from '../../../domain/value-objects/input-file.vo';
import type { OutputFileDescriptor } from '../../../domain/entities/output-file.entity';

/**
 * Batch result handed to the next pipeline stage
 */
export interface BatchResult {
  output_files: OutputFileDescriptor[];
  workflow_id: string | null;
  command: string;
  meta: Record<string, unknown>;
}

/**
 * Task Result Codec Port (Driven Port)
 * Wire encoding of results exchanged between pipeline stages
 */
export interface TaskResultCodecPort {
  encode(result: BatchResult): string;

  /**
   * Extract the output files of a previous stage's encoded result
   */
  decodeInputFiles(encoded: string): InputFileDescriptor[];
}
