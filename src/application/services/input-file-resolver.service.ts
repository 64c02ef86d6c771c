import { Inject, Injectable } from '@nestjs/common';
import type { InputFileDescriptor } from '../../domain';
import { TASK_RESULT_CODEC_PORT } from '../ports/output';
import type { TaskResultCodecPort } from '../ports/output';

/**
 * Input File Resolver
 * Picks the files a batch works on: the previous stage's output when one was
 * piped in, otherwise the explicit list. Order is kept and nothing is filtered.
 */
@Injectable()
export class InputFileResolverService {
  constructor(
    @Inject(TASK_RESULT_CODEC_PORT)
    private readonly codec: TaskResultCodecPort,
  ) {}

  resolve(
    pipeResult?: string | null,
    inputFiles?: InputFileDescriptor[] | null,
  ): InputFileDescriptor[] {
    if (pipeResult) {
      return this.codec.decodeInputFiles(pipeResult);
    }

    return inputFiles ? [...inputFiles] : [];
  }
}
