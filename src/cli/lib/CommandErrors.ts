/**
 * Command error reporting
 *
 * Separates "transaction unparseable" from other failures (missing file,
 * unwritable output, a bad profile) in what the user sees; both exit with EXIT_FAILURE.
 */

import chalk from 'chalk';
import { getLogger } from '../../logging/index.js';
import { isX12ParseError } from '../../x12/X12Errors.js';
import { EXIT_FAILURE } from '../types/index.js';
import type { CommandIO, ExitCode } from '../types/index.js';

export function describeFailure(error: unknown, input: string): string {
  if (isX12ParseError(error) && error.code !== 'InvalidProfile') {
    return `${input}: transaction unparseable (${error.code}): ${error.message}`;
  }
  const message = error instanceof Error ? error.message : String(error);
  return `${input}: ${message}`;
}

export function reportCommandError(error: unknown, input: string, io: CommandIO): ExitCode {
  const description = describeFailure(error, input);
  getLogger('x12-cli').error(description, error instanceof Error ? error : undefined);
  io.stderr(`${chalk.red('✖')} ${description}\n`);
  return EXIT_FAILURE;
}
