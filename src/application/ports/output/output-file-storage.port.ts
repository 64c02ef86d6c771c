import type { OutputFileEntity } from '../../../domain/entities/output-file.entity';

/**
 * Create Output File Options
 */
export interface CreateOutputFileOptions {
  displayName: string;
  extension: string;
  dataType: string;
}

/**
 * Output File Storage Port (Driven Port)
 * Allocates artifact files in a task's output directory and writes them
 */
export interface OutputFileStoragePort {
  /**
   * Allocate a new output file under the given directory
   */
  createOutputFile(outputPath: string, options: CreateOutputFileOptions): Promise<OutputFileEntity>;

  /**
   * Write UTF-8 text to an allocated output file, replacing any content
   */
  writeText(file: OutputFileEntity, content: string): Promise<void>;
}
