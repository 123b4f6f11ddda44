/**
 * Output record schemas
 *
 * Wire shapes handed to serializers. Field names follow the claims JSON
 * format (snake_case), not the in-memory model.
 */

import { z } from 'zod';
import type { Claim } from './Claim.js';

export const ServiceLineRecordSchema = z.object({
  procedure_code: z.string(),
  line_charge: z.string(),
});

export const ClaimRecordSchema = z.object({
  claim_id: z.string(),
  total_charge: z.string(),
  service_lines: z.array(ServiceLineRecordSchema),
});

export const ClaimRecordListSchema = z.array(ClaimRecordSchema);

export const FlatSegmentRecordSchema = z.object({
  segment_id: z.string(),
  elements: z.array(z.string()),
});

export const FlatDocumentSchema = z.object({
  file: z.string(),
  segments: z.array(FlatSegmentRecordSchema),
});

export type ServiceLineRecord = z.infer<typeof ServiceLineRecordSchema>;
export type ClaimRecord = z.infer<typeof ClaimRecordSchema>;
export type FlatSegmentRecord = z.infer<typeof FlatSegmentRecordSchema>;
export type FlatDocument = z.infer<typeof FlatDocumentSchema>;

export function toClaimRecord(claim: Claim): ClaimRecord {
  return {
    claim_id: claim.claimId,
    total_charge: claim.totalCharge,
    service_lines: claim.serviceLines.map((line) => ({
      procedure_code: line.procedureCode,
      line_charge: line.lineCharge,
    })),
  };
}

export function toClaimRecords(claims: readonly Claim[]): ClaimRecord[] {
  return claims.map(toClaimRecord);
}
