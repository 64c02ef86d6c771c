import { Injectable } from '@nestjs/common';
import type { BatchResult, TaskResultCodecPort } from '../../../application/ports/output';
import { TaskResultDecodeError, type InputFileDescriptor } from '../../../domain';
import { UpstreamTaskResultSchema } from '../../../shared/schemas/pipeline.schema';

/**
 * Base64 Task Result Codec
 * Results travel between pipeline stages as base64-encoded UTF-8 JSON
 */
@Injectable()
export class Base64TaskResultCodec implements TaskResultCodecPort {
  encode(result: BatchResult): string {
    const payload: BatchResult = {
      output_files: result.output_files,
      workflow_id: result.workflow_id,
      command: result.command,
      meta: result.meta,
    };
    return Buffer.from(JSON.stringify(payload), 'utf-8').toString('base64');
  }

  decodeInputFiles(encoded: string): InputFileDescriptor[] {
    let decoded: unknown;
    try {
      decoded = JSON.parse(Buffer.from(encoded, 'base64').toString('utf-8'));
    } catch (error) {
      throw new TaskResultDecodeError('Upstream task result is not base64-encoded JSON', {
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    const parsed = UpstreamTaskResultSchema.safeParse(decoded);
    if (!parsed.success) {
      throw new TaskResultDecodeError('Upstream task result has no valid output_files list', {
        issues: parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
      });
    }

    return parsed.data.output_files;
  }
}
