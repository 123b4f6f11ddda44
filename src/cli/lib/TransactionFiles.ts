/**
 * Transaction file I/O
 *
 * X12 is 8-bit clean single-byte text, so files are read and written as latin1
 * bytes-to-characters with no charset negotiation.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parseLoopProfile } from '../../x12/LoopProfile.js';
import type { LoopProfile } from '../../x12/LoopProfile.js';
import { InvalidProfileError } from '../../x12/X12Errors.js';
import type { CommandIO } from '../types/index.js';

export const TRANSACTION_ENCODING: BufferEncoding = 'latin1';

function resolvePath(filePath: string): string {
  return path.isAbsolute(filePath) ? filePath : path.resolve(process.cwd(), filePath);
}

export function readTransaction(filePath: string): string {
  const absolutePath = resolvePath(filePath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`File not found: ${absolutePath}`);
  }
  return fs.readFileSync(absolutePath, TRANSACTION_ENCODING);
}

/**
 * Load and validate a loop profile from a JSON file.
 */
export function readProfile(filePath: string): LoopProfile {
  const absolutePath = resolvePath(filePath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Profile not found: ${absolutePath}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(absolutePath, 'utf8'));
  } catch (error) {
    throw new InvalidProfileError(
      `Profile ${absolutePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseLoopProfile(parsed);
}

/**
 * Render a document as 2-space indented JSON.
 */
export function toJsonText(document: unknown): string {
  return JSON.stringify(document, null, 2);
}

/**
 * Write JSON text to a file, or to stdout when no file is given.
 */
export function writeJson(document: unknown, outputPath: string | undefined, io: CommandIO): void {
  const text = toJsonText(document);
  if (outputPath) {
    fs.writeFileSync(resolvePath(outputPath), text, 'utf8');
  } else {
    io.stdout(text + '\n');
  }
}
