#!/usr/bin/env node
/**
 * x12-claims CLI
 *
 * Usage: x12-claims [options] <command> <input> [command options]
 *
 * Run `x12-claims --help` for detailed usage information.
 */

import 'dotenv/config';
import { getLogger, shutdownLogging } from '../logging/index.js';
import { createProgram } from './program.js';

async function main(): Promise<void> {
  const program = createProgram();
  try {
    await program.parseAsync(process.argv);
  } finally {
    await shutdownLogging();
  }
}

main().catch((error: unknown) => {
  getLogger('x12-cli').error('CLI failed', error instanceof Error ? error : new Error(String(error)));
  process.exitCode = 1;
});
