/**
 * Validate Command
 *
 * x12-claims validate <input> [--json] [--profile file]
 * Reports envelope, hierarchy and data-quality findings without writing claims.
 */

import type { Command } from 'commander';
import { PROFESSIONAL_837_PROFILE } from '../../x12/LoopProfile.js';
import { X12ClaimsEngine } from '../../x12/X12ClaimsEngine.js';
import { reportCommandError } from '../lib/CommandErrors.js';
import { formatValidationReport } from '../lib/OutputFormatter.js';
import { readProfile, readTransaction, toJsonText } from '../lib/TransactionFiles.js';
import { EXIT_FINDINGS, EXIT_OK } from '../types/index.js';
import type { CommandIO, ExitCode, ValidateCommandOptions } from '../types/index.js';

export function runValidateCommand(input: string, options: ValidateCommandOptions, io: CommandIO): ExitCode {
  try {
    const profile = options.profile ? readProfile(options.profile) : PROFESSIONAL_837_PROFILE;
    const result = new X12ClaimsEngine({ profile }).validate(readTransaction(input));

    if (options.json) {
      io.stdout(toJsonText({ file: input, ...result }) + '\n');
    } else {
      io.stdout(formatValidationReport(input, result) + '\n');
    }

    return result.findings.length > 0 ? EXIT_FINDINGS : EXIT_OK;
  } catch (error) {
    return reportCommandError(error, input, io);
  }
}

export function registerValidateCommand(
  program: Command,
  io: CommandIO,
  setExitCode: (code: ExitCode) => void
): void {
  program
    .command('validate <input>')
    .description('Check envelope pairing, control numbers, counts and claim data quality')
    .option('--json', 'Output findings as JSON')
    .option('--profile <file>', 'Loop profile JSON naming the trigger segments')
    .action((input: string, options: ValidateCommandOptions) => {
      setExitCode(runValidateCommand(input, options, io));
    });
}
