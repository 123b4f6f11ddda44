/**
 * Tests for command failure descriptions
 */

import { describe, it, expect, beforeAll } from '@jest/globals';
import chalk from 'chalk';
import { describeFailure, reportCommandError } from '../../../../src/cli/lib/CommandErrors.js';
import { EXIT_FAILURE } from '../../../../src/cli/types/index.js';
import { InvalidProfileError, MalformedInputError } from '../../../../src/x12/X12Errors.js';
import { captureIO } from '../../../helpers/cliHarness.js';

describe('CommandErrors', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  it('should mark parse errors as unparseable transactions', () => {
    expect(describeFailure(new MalformedInputError('no terminator'), 'in.837')).toBe(
      'in.837: transaction unparseable (MalformedInput): no terminator'
    );
  });

  it('should describe profile errors without the unparseable prefix', () => {
    expect(describeFailure(new InvalidProfileError('Invalid loop profile: name: bad'), 'in.837')).toBe(
      'in.837: Invalid loop profile: name: bad'
    );
  });

  it('should describe other errors by message', () => {
    expect(describeFailure(new Error('EACCES'), 'in.837')).toBe('in.837: EACCES');
    expect(describeFailure('boom', 'in.837')).toBe('in.837: boom');
  });

  it('should write the description to stderr and return the failure status', () => {
    const io = captureIO();

    expect(reportCommandError(new Error('disk full'), 'in.837', io)).toBe(EXIT_FAILURE);
    expect(io.err).toEqual(['✖ in.837: disk full\n']);
  });
});
