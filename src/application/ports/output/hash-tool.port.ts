import type { HashToolOutput } from '../../../domain/value-objects/hash-outcome.vo';

export type { HashToolOutput };

/**
 * Hash Tool Port (Driven Port)
 * Runs the external fuzzy-hashing tool on one file
 */
export interface HashToolPort {
  /**
   * Run the tool on a file and report how it completed.
   * Resolves even when the tool fails or cannot be started.
   */
  run(path: string): Promise<HashToolOutput>;
}
