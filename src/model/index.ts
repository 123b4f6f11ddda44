export { createClaim } from './Claim.js';
export type { Claim, ServiceLine } from './Claim.js';
export {
  ServiceLineRecordSchema,
  ClaimRecordSchema,
  ClaimRecordListSchema,
  FlatSegmentRecordSchema,
  FlatDocumentSchema,
  toClaimRecord,
  toClaimRecords,
} from './records.js';
export type { ServiceLineRecord, ClaimRecord, FlatSegmentRecord, FlatDocument } from './records.js';
