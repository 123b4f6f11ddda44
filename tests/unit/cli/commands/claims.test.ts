/**
 * Tests for the claims command
 */

import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';
import { runClaimsCommand } from '../../../../src/cli/commands/claims.js';
import { EXIT_FAILURE, EXIT_FINDINGS, EXIT_OK } from '../../../../src/cli/types/index.js';
import { ClaimRecordListSchema } from '../../../../src/model/records.js';
import { FIXTURES_DIR, SCENARIO_A } from '../../../helpers/x12Samples.js';
import { captureIO, makeTempDir, removeTempDir, writeTempFile } from '../../../helpers/cliHarness.js';

describe('claims command', () => {
  const fixture = path.join(FIXTURES_DIR, 'professional-claims.837');
  let tempDir: string;
  let scenarioA: string;

  beforeAll(() => {
    chalk.level = 0;
    tempDir = makeTempDir();
    scenarioA = writeTempFile(tempDir, 'scenario-a.837', SCENARIO_A);
  });

  afterAll(() => {
    removeTempDir(tempDir);
  });

  it('should write the claims JSON to stdout', () => {
    const io = captureIO();

    const code = runClaimsCommand(fixture, {}, io);

    expect(code).toBe(EXIT_OK);
    expect(io.err).toEqual([]);
    const records = ClaimRecordListSchema.parse(JSON.parse(io.out.join('')));
    expect(records.map((record) => [record.claim_id, record.total_charge])).toEqual([
      ['PCN-1001', '150.00'],
      ['PCN-1002', '75.5'],
      ['PCN-1003', '0'],
    ]);
    expect(records[0]?.service_lines).toEqual([
      { procedure_code: 'HC:99213', line_charge: '100.00' },
      { procedure_code: 'HC:87880', line_charge: '50.00' },
    ]);
  });

  it('should end stdout output with a newline', () => {
    const io = captureIO();

    runClaimsCommand(scenarioA, {}, io);

    expect(io.out.join('').endsWith(']\n')).toBe(true);
  });

  it('should read a file that starts with a UTF-8 byte-order mark', () => {
    const io = captureIO();
    const input = path.join(tempDir, 'bom.837');
    fs.writeFileSync(input, Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from(SCENARIO_A, 'latin1')]));

    const code = runClaimsCommand(input, {}, io);

    expect(code).toBe(EXIT_OK);
    expect(ClaimRecordListSchema.parse(JSON.parse(io.out.join('')))).toEqual([
      {
        claim_id: '1001',
        total_charge: '100',
        service_lines: [{ procedure_code: 'HC:99213', line_charge: '100' }],
      },
    ]);
  });

  it('should write the claims JSON to an output file', () => {
    const io = captureIO();
    const output = path.join(tempDir, 'claims.json');

    const code = runClaimsCommand(scenarioA, { output }, io);

    expect(code).toBe(EXIT_OK);
    expect(io.out).toEqual([]);
    expect(JSON.parse(fs.readFileSync(output, 'utf8'))).toEqual([
      {
        claim_id: '1001',
        total_charge: '100',
        service_lines: [{ procedure_code: 'HC:99213', line_charge: '100' }],
      },
    ]);
  });

  it('should exit with the findings status under --strict', () => {
    const io = captureIO();

    const code = runClaimsCommand(scenarioA, { strict: true }, io);

    expect(code).toBe(EXIT_FINDINGS);
    expect(io.err).toEqual([`! ${scenarioA}: 2 finding(s) under --strict\n`]);
    expect(io.out).toHaveLength(1);
  });

  it('should succeed under --strict when there are no findings', () => {
    expect(runClaimsCommand(fixture, { strict: true }, captureIO())).toBe(EXIT_OK);
  });

  it('should apply a profile file', () => {
    const io = captureIO();

    const code = runClaimsCommand(scenarioA, { profile: path.join(FIXTURES_DIR, 'profile-837p.json') }, io);

    expect(code).toBe(EXIT_OK);
    expect(ClaimRecordListSchema.parse(JSON.parse(io.out.join('')))).toHaveLength(1);
  });

  it('should report a profile that fails validation', () => {
    const io = captureIO();
    const profile = path.join(FIXTURES_DIR, 'profile-invalid.json');

    const code = runClaimsCommand(scenarioA, { profile }, io);

    expect(code).toBe(EXIT_FAILURE);
    expect(io.out).toEqual([]);
    expect(io.err).toHaveLength(1);
    expect(io.err[0]).toMatch(/^✖ .*scenario-a\.837: Invalid loop profile: claimTrigger: /);
  });

  it('should report a missing input file', () => {
    const io = captureIO();
    const missing = path.join(tempDir, 'missing.837');

    const code = runClaimsCommand(missing, {}, io);

    expect(code).toBe(EXIT_FAILURE);
    expect(io.err).toEqual([`✖ ${missing}: File not found: ${missing}\n`]);
  });

  it('should report an unparseable transaction', () => {
    const io = captureIO();
    const input = writeTempFile(tempDir, 'garbage.837', 'GS*HC*SENDER~');

    const code = runClaimsCommand(input, {}, io);

    expect(code).toBe(EXIT_FAILURE);
    expect(io.err[0]).toMatch(/^✖ .*garbage\.837: transaction unparseable \(MalformedEnvelope\): /);
  });
});
