/**
 * Claim model produced by the claim extractor.
 *
 * Charges stay strings so the source's formatting and precision survive.
 */

export interface ServiceLine {
  /** SV101 qualifier and code, e.g. "HC:99213" */
  readonly procedureCode: string;
  /** SV102 */
  readonly lineCharge: string;
}

export interface Claim {
  /** CLM01 patient control number */
  readonly claimId: string;
  /** CLM02 total claim charge */
  readonly totalCharge: string;
  readonly serviceLines: readonly ServiceLine[];
}

export function createClaim(claimId: string, totalCharge: string, serviceLines: ServiceLine[]): Claim {
  return Object.freeze({
    claimId,
    totalCharge,
    serviceLines: Object.freeze(serviceLines.map((line) => Object.freeze({ ...line }))),
  });
}
