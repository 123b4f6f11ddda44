/**
 * CLI program construction
 *
 * Kept apart from the bin entry so tests can drive the commands with their
 * own output collectors and exit-code sink.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { LogLevel, setGlobalLevel } from '../logging/index.js';
import { registerClaimsCommand } from './commands/claims.js';
import { registerFlatCommand } from './commands/flat.js';
import { registerValidateCommand } from './commands/validate.js';
import type { CommandIO, ExitCode, GlobalOptions } from './types/index.js';

export const VERSION = '0.1.0';

export interface ProgramHooks {
  io: CommandIO;
  setExitCode(code: ExitCode): void;
}

export const processHooks: ProgramHooks = {
  io: {
    stdout: (text) => {
      process.stdout.write(text);
    },
    stderr: (text) => {
      process.stderr.write(text);
    },
  },
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

export function createProgram(hooks: ProgramHooks = processHooks): Command {
  const program = new Command();
  const setExitCode = (code: ExitCode): void => hooks.setExitCode(code);

  program
    .name('x12-claims')
    .description('Parse X12 837P professional claims into JSON')
    .version(VERSION, '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Debug logging on stderr');

  program.hook('preAction', (thisCommand) => {
    if (thisCommand.opts<GlobalOptions>().verbose) {
      setGlobalLevel(LogLevel.DEBUG);
    }
  });

  registerClaimsCommand(program, hooks.io, setExitCode);
  registerFlatCommand(program, hooks.io, setExitCode);
  registerValidateCommand(program, hooks.io, setExitCode);

  program.addHelpText(
    'after',
    `
${chalk.bold('Examples:')}
  ${chalk.gray('# Claims JSON to stdout')}
  $ x12-claims claims sample.837

  ${chalk.gray('# Flat segment dump to a file')}
  $ x12-claims flat sample.837 -o sample.flat.json

  ${chalk.gray('# Fail the batch step when findings are reported')}
  $ x12-claims claims sample.837 -o claims.json --strict
`
  );

  return program;
}
