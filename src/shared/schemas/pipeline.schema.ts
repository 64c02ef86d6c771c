import { z } from 'zod';

/**
 * Input file entry shared by task messages and upstream results.
 * Extra keys (source ids, hashes from earlier stages) pass through.
 */
export const InputFileDescriptorSchema = z
  .object({
    path: z.string().nullish(),
    display_name: z.string().nullish(),
    filename: z.string().nullish(),
    uuid: z.string().nullish(),
  })
  .passthrough();

/**
 * Decoded result of a previous pipeline stage. Only `output_files` matters here.
 */
export const UpstreamTaskResultSchema = z
  .object({
    output_files: z.array(InputFileDescriptorSchema),
  })
  .passthrough();

export type UpstreamTaskResult = z.infer<typeof UpstreamTaskResultSchema>;
