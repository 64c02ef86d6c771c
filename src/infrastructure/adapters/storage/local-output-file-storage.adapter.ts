import { Injectable } from '@nestjs/common';
import { mkdir, writeFile } from 'fs/promises';
import { v4 as uuidv4 } from 'uuid';
import type {
  CreateOutputFileOptions,
  OutputFileStoragePort,
} from '../../../application/ports/output';
import { OutputFileEntity } from '../../../domain';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';

/**
 * Local Output File Storage Adapter
 * Allocates artifacts as `<uuid>.<extension>` inside the task's output directory
 */
@Injectable()
export class LocalOutputFileStorageAdapter implements OutputFileStoragePort {
  constructor(private readonly logger: PinoLoggerService) {}

  async createOutputFile(
    outputPath: string,
    options: CreateOutputFileOptions,
  ): Promise<OutputFileEntity> {
    await mkdir(outputPath, { recursive: true });

    const file = OutputFileEntity.create({
      uuid: uuidv4(),
      outputPath,
      displayName: options.displayName,
      extension: options.extension,
      dataType: options.dataType,
    });

    this.logger.debug(
      { path: file.path, displayName: file.displayName },
      'Allocated output file',
    );

    return file;
  }

  async writeText(file: OutputFileEntity, content: string): Promise<void> {
    await writeFile(file.path, content, { encoding: 'utf-8' });
  }
}
