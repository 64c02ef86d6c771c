import { z } from 'zod';
import { TaskMessageError } from '../../domain';
import { InputFileDescriptorSchema } from '../../shared/schemas/pipeline.schema';
import { SSDEEP_TASK_NAME } from '../task-metadata';

export const SsdeepTaskMessageSchema = z.object({
  taskId: z.string().min(1),
  taskName: z.literal(SSDEEP_TASK_NAME).optional(),
  pipeResult: z.string().nullish(),
  inputFiles: z.array(InputFileDescriptorSchema).nullish(),
  outputPath: z.string().min(1).optional(),
  workflowId: z.string().nullish(),
  taskConfig: z.record(z.unknown()).nullish(),
});

export type SsdeepTaskMessageDto = z.infer<typeof SsdeepTaskMessageSchema>;

export function validateSsdeepTaskMessage(data: unknown): SsdeepTaskMessageDto {
  const result = SsdeepTaskMessageSchema.safeParse(data);

  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`);
    throw new TaskMessageError(`Invalid ssdeep task message: ${issues.join('; ')}`, { issues });
  }

  return result.data;
}
