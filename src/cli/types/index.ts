/**
 * CLI type definitions
 */

/**
 * Global CLI options available on all commands
 */
export interface GlobalOptions {
  verbose?: boolean;
}

export interface ClaimsCommandOptions {
  output?: string;
  profile?: string;
  strict?: boolean;
}

export interface FlatCommandOptions {
  output?: string;
}

export interface ValidateCommandOptions {
  json?: boolean;
  profile?: string;
}

/**
 * Where command output goes. Documents go to stdout; tests swap in collectors.
 */
export interface CommandIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

export const EXIT_OK = 0;
/** Transaction unparseable, or the input/output file could not be used */
export const EXIT_FAILURE = 1;
/** Parsed, but findings were reported under --strict (or by validate) */
export const EXIT_FINDINGS = 2;

export type ExitCode = typeof EXIT_OK | typeof EXIT_FAILURE | typeof EXIT_FINDINGS;
