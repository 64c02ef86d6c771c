import { describe, it, expect } from 'vitest';
import { validateSsdeepTaskMessage } from '../../../src/processing/dto/ssdeep-task.dto';
import { TaskMessageError } from '../../../src/domain/errors/worker.errors';
import { SSDEEP_TASK_NAME } from '../../../src/processing/task-metadata';

describe('validateSsdeepTaskMessage', () => {
  it('should accept a full task message', () => {
    const message = {
      taskId: 'task-1',
      taskName: SSDEEP_TASK_NAME,
      pipeResult: null,
      inputFiles: [{ path: '/data/a.txt', display_name: 'a.txt', uuid: 'u1', size: 12 }],
      outputPath: '/out',
      workflowId: 'wf-1',
      taskConfig: {},
    };

    expect(validateSsdeepTaskMessage(message)).toEqual(message);
  });

  it('should accept entries without a path', () => {
    const dto = validateSsdeepTaskMessage({ taskId: 't', inputFiles: [{ display_name: 'x' }] });

    expect(dto.inputFiles).toEqual([{ display_name: 'x' }]);
  });

  it('should reject a message without a task id', () => {
    expect(() => validateSsdeepTaskMessage({ inputFiles: [] })).toThrow(TaskMessageError);
    expect(() => validateSsdeepTaskMessage({ inputFiles: [] })).toThrow(
      'Invalid ssdeep task message: taskId: Required',
    );
  });

  it('should reject a body that is not an object', () => {
    expect(() => validateSsdeepTaskMessage('plain text')).toThrow(
      'Invalid ssdeep task message: (root): Expected object, received string',
    );
  });

  it('should reject another task name', () => {
    expect(() => validateSsdeepTaskMessage({ taskId: 't', taskName: 'other' })).toThrow(
      TaskMessageError,
    );
  });
});
