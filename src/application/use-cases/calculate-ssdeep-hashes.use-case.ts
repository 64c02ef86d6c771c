import { Inject, Injectable } from '@nestjs/common';
import type {
  CalculateSsdeepHashesCommand,
  CalculateSsdeepHashesPort,
} from '../ports/input/calculate-ssdeep-hashes.port';
import { HASH_TOOL_PORT, OUTPUT_FILE_STORAGE_PORT } from '../ports/output';
import type { BatchResult, HashToolPort, OutputFileStoragePort } from '../ports/output';
import { InputFileResolverService } from '../services/input-file-resolver.service';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';
import {
  InputFileVO,
  SPAWN_FAILURE_STATUS,
  SSDEEP_COMMAND_SIGNATURE,
  classifyHashOutput,
  isHashError,
  renderHashOutcome,
  type HashOutcome,
  type OutputFileDescriptor,
} from '../../domain';

export const SSDEEP_OUTPUT_EXTENSION = 'ssdeep';
export const SSDEEP_OUTPUT_DATA_TYPE = 'text/plain';
export const NO_INPUT_FILES_MESSAGE = 'No input files provided to calculate SSDeep hash.';

/**
 * Calculate SSDeep Hashes Use Case
 * Resolves the batch's input files, hashes them one after another and writes
 * one text artifact per file that has a path
 */
@Injectable()
export class CalculateSsdeepHashesUseCase implements CalculateSsdeepHashesPort {
  constructor(
    @Inject(HASH_TOOL_PORT)
    private readonly hashTool: HashToolPort,
    @Inject(OUTPUT_FILE_STORAGE_PORT)
    private readonly outputStorage: OutputFileStoragePort,
    private readonly inputResolver: InputFileResolverService,
    private readonly logger: PinoLoggerService,
  ) {
    this.logger.setContext(CalculateSsdeepHashesUseCase.name);
  }

  async execute(
    command: CalculateSsdeepHashesCommand,
    logger: PinoLoggerService = this.logger,
  ): Promise<BatchResult> {
    const workflowId = command.workflowId ?? null;
    const inputFiles = this.inputResolver.resolve(command.pipeResult, command.inputFiles);

    if (inputFiles.length === 0) {
      logger.info({ workflowId }, NO_INPUT_FILES_MESSAGE);
      return {
        output_files: [],
        workflow_id: workflowId,
        command: SSDEEP_COMMAND_SIGNATURE,
        meta: { message: NO_INPUT_FILES_MESSAGE },
      };
    }

    logger.info({ workflowId, inputCount: inputFiles.length }, 'Calculating SSDeep hashes');

    const outputFiles: OutputFileDescriptor[] = [];

    // Sequential on purpose: artifacts are produced in input order
    for (const descriptor of inputFiles) {
      const inputFile = InputFileVO.from(descriptor);
      const path = inputFile.path;

      if (path === undefined) {
        logger.warn({ inputFile: inputFile.toJSON() }, 'Skipping file entry with no path');
        continue;
      }

      const outcome = await this.hashFile(path, logger);

      const outputFile = await this.outputStorage.createOutputFile(command.outputPath, {
        displayName: `SSDeep hash for ${inputFile.displayName}`,
        extension: SSDEEP_OUTPUT_EXTENSION,
        dataType: SSDEEP_OUTPUT_DATA_TYPE,
      });
      await this.outputStorage.writeText(outputFile, `${renderHashOutcome(outcome)}\n`);

      logger.debug(
        { path, outcome: outcome.kind, outputFile: outputFile.path },
        'Wrote SSDeep artifact',
      );
      outputFiles.push(outputFile.toDict());
    }

    if (outputFiles.length === 0) {
      logger.warn(
        { workflowId, inputCount: inputFiles.length },
        'SSDeep task processed input files but generated no output files overall',
      );
    }

    return {
      output_files: outputFiles,
      workflow_id: workflowId,
      command: SSDEEP_COMMAND_SIGNATURE,
      meta: {},
    };
  }

  private async hashFile(path: string, logger: PinoLoggerService): Promise<HashOutcome> {
    let outcome: HashOutcome;

    try {
      outcome = classifyHashOutput(await this.hashTool.run(path));
    } catch (error) {
      // Adapters resolve on tool failure; anything thrown here still belongs to this file only
      const message = error instanceof Error ? error.message : String(error);
      outcome = { kind: 'error', status: SPAWN_FAILURE_STATUS, message };
    }

    if (isHashError(outcome)) {
      logger.warn(
        { path, status: outcome.status },
        `SSDeep failed for ${path}: ${renderHashOutcome(outcome)}`,
      );
    }

    return outcome;
  }
}
