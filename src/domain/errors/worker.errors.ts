/**
 * Typed errors raised at the worker's boundaries. Per-file hashing failures
 * are never thrown; they end up as text in that file's artifact.
 */

export class WorkerError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'WorkerError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** A queue message that can never be processed, however often it is retried. */
export class TaskMessageError extends WorkerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'INVALID_TASK_MESSAGE', context);
    this.name = 'TaskMessageError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** The previous stage's encoded result could not be turned into input files. */
export class TaskResultDecodeError extends WorkerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'TASK_RESULT_DECODE_ERROR', context);
    this.name = 'TaskResultDecodeError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
