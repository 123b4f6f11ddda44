/**
 * Flat Command
 *
 * x12-claims flat <input> [-o file]
 * Writes every segment in file order with no loop structure.
 */

import type { Command } from 'commander';
import { FlatDocumentSchema } from '../../model/records.js';
import { X12ClaimsEngine } from '../../x12/X12ClaimsEngine.js';
import { reportCommandError } from '../lib/CommandErrors.js';
import { readTransaction, writeJson } from '../lib/TransactionFiles.js';
import { EXIT_OK } from '../types/index.js';
import type { CommandIO, ExitCode, FlatCommandOptions } from '../types/index.js';

export function runFlatCommand(input: string, options: FlatCommandOptions, io: CommandIO): ExitCode {
  try {
    const document = new X12ClaimsEngine().projectFlat(readTransaction(input), input);
    writeJson(FlatDocumentSchema.parse(document), options.output, io);
    return EXIT_OK;
  } catch (error) {
    return reportCommandError(error, input, io);
  }
}

export function registerFlatCommand(
  program: Command,
  io: CommandIO,
  setExitCode: (code: ExitCode) => void
): void {
  program
    .command('flat <input>')
    .description('Dump every X12 segment and its elements as JSON, in file order')
    .option('-o, --output <file>', 'JSON output file (default: stdout)')
    .action((input: string, options: FlatCommandOptions) => {
      setExitCode(runFlatCommand(input, options, io));
    });
}
