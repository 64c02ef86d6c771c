/**
 * Hash Outcome Value Object
 *
 * The result of one ssdeep invocation, classified from its exit status and
 * output streams. Every downstream step (artifact rendering, logging) matches
 * on `kind` instead of re-reading the tool's text.
 */

/** Marker between the digest and the quoted file name in `HASH,"FILENAME"`. */
export const SSDEEP_RESULT_MARKER = ',"';

/** Fixed flags: `-s` silent mode, `-b` bare file names. */
export const SSDEEP_FLAGS = ['-s', '-b'] as const;

/** Invocation signature reported in every batch result. */
export const SSDEEP_COMMAND_SIGNATURE = ['ssdeep', ...SSDEEP_FLAGS].join(' ');

/** Exit status reported when the tool could not be started at all. */
export const SPAWN_FAILURE_STATUS = 127;

/** Exit status reported when a run was killed for exceeding its timeout. */
export const TIMEOUT_STATUS = 124;

/**
 * Raw completion of one tool run.
 */
export interface HashToolOutput {
  status: number;
  stdout: string;
  stderr: string;
}

export interface HashSuccess {
  kind: 'success';
  digest: string;
}

export interface HashNotice {
  kind: 'notice';
  text: string;
}

export interface HashError {
  kind: 'error';
  status: number;
  message: string;
}

export type HashOutcome = HashSuccess | HashNotice | HashError;

/**
 * Classify a tool run. A non-zero status wins over anything on stdout.
 */
export function classifyHashOutput(output: HashToolOutput): HashOutcome {
  const stdout = output.stdout.trim();

  if (output.status !== 0) {
    return {
      kind: 'error',
      status: output.status,
      message: output.stderr.trim() || stdout,
    };
  }

  const markerIndex = stdout.indexOf(SSDEEP_RESULT_MARKER);
  if (markerIndex !== -1) {
    return { kind: 'success', digest: stdout.slice(0, markerIndex) };
  }

  // e.g. "file too small" remarks, which ssdeep prints on stdout in silent mode
  return { kind: 'notice', text: stdout };
}

/**
 * Text written into the artifact for an outcome, without the trailing newline.
 */
export function renderHashOutcome(outcome: HashOutcome): string {
  switch (outcome.kind) {
    case 'success':
      return outcome.digest;
    case 'notice':
      return `SSDeep notice: ${outcome.text}`;
    case 'error':
      return `Error running ssdeep (code ${outcome.status}): ${outcome.message}`;
    default: {
      const unreachable: never = outcome;
      throw new Error(`Unknown hash outcome: ${JSON.stringify(unreachable)}`);
    }
  }
}

export function isHashError(outcome: HashOutcome): outcome is HashError {
  return outcome.kind === 'error';
}
