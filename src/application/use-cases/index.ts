/**
 * Use Cases Barrel Export
 */
export {
  CalculateSsdeepHashesUseCase,
  NO_INPUT_FILES_MESSAGE,
  SSDEEP_OUTPUT_DATA_TYPE,
  SSDEEP_OUTPUT_EXTENSION,
} from './calculate-ssdeep-hashes.use-case';
