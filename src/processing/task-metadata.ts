/**
 * Registration details of the ssdeep task, as advertised to the pipeline.
 */

export const SSDEEP_TASK_NAME = 'ssdeep-hash-worker.tasks.calculate_ssdeep_hash';

export interface TaskMetadata {
  display_name: string;
  description: string;
  task_config: unknown[];
}

export const SSDEEP_TASK_METADATA: TaskMetadata = {
  display_name: 'SSDeep Hash Calculation',
  description:
    'Calculates the SSDeep (context-triggered piecewise hash) for each input file. ' +
    'Output is a text file per input, containing the hash or an error/notice.',
  // No user-configurable options for basic hashing
  task_config: [],
};
