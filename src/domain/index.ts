/**
 * Domain Layer Barrel Export
 *
 * The domain layer has no framework dependencies.
 */

// Entities
export {
  OutputFileEntity,
  type OutputFileDescriptor,
  type OutputFileProps,
} from './entities/output-file.entity';

// Value Objects
export { InputFileVO, type InputFileDescriptor } from './value-objects/input-file.vo';
export {
  classifyHashOutput,
  renderHashOutcome,
  isHashError,
  SSDEEP_COMMAND_SIGNATURE,
  SSDEEP_FLAGS,
  SSDEEP_RESULT_MARKER,
  SPAWN_FAILURE_STATUS,
  TIMEOUT_STATUS,
  type HashOutcome,
  type HashSuccess,
  type HashNotice,
  type HashError,
  type HashToolOutput,
} from './value-objects/hash-outcome.vo';

// Errors
export { WorkerError, TaskMessageError, TaskResultDecodeError } from './errors/worker.errors';
