/**
 * Input Ports (Driving Ports) Barrel Export
 */
export type {
  CalculateSsdeepHashesCommand,
  CalculateSsdeepHashesPort,
} from './calculate-ssdeep-hashes.port';
