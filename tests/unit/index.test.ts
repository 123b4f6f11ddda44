import { describe, it, expect } from '@jest/globals';
import * as engine from '../../src/index.js';
import { SCENARIO_A } from '../helpers/x12Samples.js';

describe('package entry', () => {
  it('should expose the pipeline and the record conversion together', () => {
    const claims = engine.extractClaimsFrom837P(SCENARIO_A);

    expect(engine.toClaimRecords(claims)).toEqual([
      {
        claim_id: '1001',
        total_charge: '100',
        service_lines: [{ procedure_code: 'HC:99213', line_charge: '100' }],
      },
    ]);
  });

  it('should expose the default profile and error classes', () => {
    expect(engine.PROFESSIONAL_837_PROFILE.claimTrigger).toBe('CLM');
    expect(new engine.MalformedInputError('x')).toBeInstanceOf(engine.X12ParseError);
  });
});
