/**
 * Non-fatal findings reported alongside engine output.
 */

export type EnvelopeFindingCode =
  | 'MissingTrailer'
  | 'UnmatchedTrailer'
  | 'MisplacedHeader'
  | 'ControlNumberMismatch'
  | 'SegmentCountMismatch'
  | 'TransactionCountMismatch'
  | 'GroupCountMismatch';

export interface EnvelopeFinding {
  kind: 'EnvelopeMismatch';
  code: EnvelopeFindingCode;
  /** Position of the segment the finding is about */
  position: number;
  segmentId: string;
  message: string;
}

export type HierarchyFindingCode = 'DuplicateHierarchicalId' | 'UnknownHierarchicalParent';

export interface HierarchyFinding {
  kind: 'HierarchyMismatch';
  code: HierarchyFindingCode;
  position: number;
  segmentId: string;
  message: string;
}

export interface DataQualityFinding {
  kind: 'MissingField' | 'MissingServiceSegment';
  position: number;
  segmentId: string;
  /** X12 element reference such as CLM01 or SV102; absent for MissingServiceSegment */
  field?: string;
  /** Claim the finding belongs to; may itself be '' */
  claimId: string;
  message: string;
}

export type X12Finding = EnvelopeFinding | HierarchyFinding | DataQualityFinding;

/**
 * Sort findings by segment position; ties keep report order.
 */
export function sortFindings<T extends X12Finding>(findings: readonly T[]): T[] {
  return [...findings].sort((a, b) => a.position - b.position);
}

export function formatFinding(finding: X12Finding): string {
  const label = finding.kind === 'EnvelopeMismatch' || finding.kind === 'HierarchyMismatch' ? finding.code : finding.kind;
  return `${label} at segment ${finding.position} (${finding.segmentId}): ${finding.message}`;
}
