/**
 * Claims Command
 *
 * x12-claims claims <input> [-o file] [--profile file] [--strict]
 * Writes the claims JSON array for one 837P transaction.
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { getLogger, registerComponent } from '../../logging/index.js';
import { ClaimRecordListSchema, toClaimRecords } from '../../model/records.js';
import { formatFinding } from '../../x12/Findings.js';
import { PROFESSIONAL_837_PROFILE } from '../../x12/LoopProfile.js';
import { X12ClaimsEngine, allFindings } from '../../x12/X12ClaimsEngine.js';
import { reportCommandError } from '../lib/CommandErrors.js';
import { readProfile, readTransaction, writeJson } from '../lib/TransactionFiles.js';
import { EXIT_FINDINGS, EXIT_OK } from '../types/index.js';
import type { ClaimsCommandOptions, CommandIO, ExitCode } from '../types/index.js';

registerComponent('x12-cli', 'Command-line interface');

export function runClaimsCommand(input: string, options: ClaimsCommandOptions, io: CommandIO): ExitCode {
  const logger = getLogger('x12-cli');

  try {
    const profile = options.profile ? readProfile(options.profile) : PROFESSIONAL_837_PROFILE;
    const engine = new X12ClaimsEngine({ profile });
    const result = engine.extractClaims(readTransaction(input));

    writeJson(ClaimRecordListSchema.parse(toClaimRecords(result.claims)), options.output, io);

    const findings = allFindings(result);
    for (const finding of findings) {
      logger.warn(`${input}: ${formatFinding(finding)}`);
    }

    if (options.strict && findings.length > 0) {
      io.stderr(`${chalk.yellow('!')} ${input}: ${findings.length} finding(s) under --strict\n`);
      return EXIT_FINDINGS;
    }
    return EXIT_OK;
  } catch (error) {
    return reportCommandError(error, input, io);
  }
}

export function registerClaimsCommand(
  program: Command,
  io: CommandIO,
  setExitCode: (code: ExitCode) => void
): void {
  program
    .command('claims <input>')
    .description('Extract claims and service lines from an X12 837P file as JSON')
    .option('-o, --output <file>', 'JSON output file (default: stdout)')
    .option('--profile <file>', 'Loop profile JSON naming the trigger segments')
    .option('--strict', 'Exit with status 2 when envelope or data-quality findings are reported')
    .action((input: string, options: ClaimsCommandOptions) => {
      setExitCode(runClaimsCommand(input, options, io));
    });
}
