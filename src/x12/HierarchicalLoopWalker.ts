/**
 * Hierarchical loop walker
 *
 * X12 loops have no end marker: a loop ends where the next trigger segment of
 * the same or a higher level begins. The walker infers those boundaries with a
 * three-state machine (Outside, InClaim, InServiceLine) driven by the profile's
 * trigger segments, and collects the HL forest for diagnostics.
 */

import { getLogger, registerComponent } from '../logging/index.js';
import type { HierarchyFinding } from './Findings.js';
import { PROFESSIONAL_837_PROFILE } from './LoopProfile.js';
import type { LoopProfile } from './LoopProfile.js';
import type { Segment } from './Segment.js';

registerComponent('x12-walker', 'Claim and service-line loop detection');

export type LoopKind = 'ClaimLoop' | 'ServiceLineLoop';

export type WalkerState = 'Outside' | 'InClaim' | 'InServiceLine';

/**
 * Indices [start, end) into the walked segment array belonging to one loop instance.
 */
export interface LoopSpan {
  readonly kind: LoopKind;
  readonly start: number;
  readonly end: number;
}

export interface SegmentRange {
  readonly start: number;
  readonly end: number;
}

export interface HierarchicalNode {
  readonly id: string;
  /** '' for a root node */
  readonly parentId: string;
  /** HL03, e.g. 20 billing provider, 22 subscriber, 23 patient */
  readonly levelCode: string;
  /** HL04: '1' when child levels follow */
  readonly childCode: string;
  readonly position: number;
}

export interface WalkResult {
  /** Spans ordered by start position; a claim precedes the service lines it contains */
  readonly spans: readonly LoopSpan[];
  readonly hierarchy: readonly HierarchicalNode[];
  readonly findings: readonly HierarchyFinding[];
}

interface OpenSpan {
  kind: LoopKind;
  start: number;
  end: number;
}

export class HierarchicalLoopWalker {
  private readonly logger = getLogger('x12-walker');

  constructor(private readonly profile: LoopProfile = PROFESSIONAL_837_PROFILE) {}

  /**
   * Range strictly between the transaction header and its trailer.
   * Without a header the whole sequence is walked; without a trailer, the rest of it.
   */
  transactionRange(segments: readonly Segment[]): SegmentRange {
    const headerIndex = segments.findIndex((s) => s.id === this.profile.transactionHeader);
    if (headerIndex === -1) {
      return { start: 0, end: segments.length };
    }

    const start = headerIndex + 1;
    for (let i = start; i < segments.length; i++) {
      if (segments[i]?.id === this.profile.transactionTrailer) {
        return { start, end: i };
      }
    }
    return { start, end: segments.length };
  }

  /**
   * Walk segments[range.start, range.end) and return the loop spans found there.
   * Total over any input: segments that match no trigger are left un-spanned.
   */
  walk(segments: readonly Segment[], range: SegmentRange = this.transactionRange(segments)): WalkResult {
    const { claimTrigger, serviceLineTrigger, hierarchicalLevel } = this.profile;
    const spans: OpenSpan[] = [];
    const hierarchy = new HierarchyBuilder();
    const traceEnabled = this.logger.isTraceEnabled();

    let state: WalkerState = 'Outside';
    let claim: OpenSpan | null = null;
    let line: OpenSpan | null = null;

    const open = (kind: LoopKind, start: number): OpenSpan => {
      const span: OpenSpan = { kind, start, end: start };
      spans.push(span);
      return span;
    };

    const closeAll = (end: number): void => {
      if (line) line.end = end;
      if (claim) claim.end = end;
      line = null;
      claim = null;
    };

    const first = Math.max(0, range.start);
    const last = Math.min(segments.length, range.end);

    for (let i = first; i < last; i++) {
      const segment = segments[i];
      if (!segment) continue;
      const previous: WalkerState = state;

      if (segment.id === claimTrigger) {
        closeAll(i);
        claim = open('ClaimLoop', i);
        state = 'InClaim';
      } else if (segment.id === serviceLineTrigger && state !== 'Outside') {
        if (line) line.end = i;
        line = open('ServiceLineLoop', i);
        state = 'InServiceLine';
      } else if (segment.id === hierarchicalLevel) {
        closeAll(i);
        state = 'Outside';
        hierarchy.add(segment);
      }

      if (traceEnabled && previous !== state) {
        this.logger.trace(`${previous} -> ${state}`, { segmentId: segment.id, position: segment.position });
      }
    }

    closeAll(Math.max(first, last));

    const result: WalkResult = {
      spans: spans.map(({ kind, start, end }) => Object.freeze({ kind, start, end })),
      hierarchy: hierarchy.nodes,
      findings: hierarchy.findings,
    };

    this.logger.debug('Walked loops', {
      claimLoops: result.spans.filter((s) => s.kind === 'ClaimLoop').length,
      serviceLineLoops: result.spans.filter((s) => s.kind === 'ServiceLineLoop').length,
      hierarchicalLevels: result.hierarchy.length,
    });

    return result;
  }
}

/**
 * Collects HL nodes in declaration order and checks parent references.
 */
class HierarchyBuilder {
  readonly nodes: HierarchicalNode[] = [];
  readonly findings: HierarchyFinding[] = [];
  private readonly declared = new Set<string>();

  add(segment: Segment): void {
    const node: HierarchicalNode = Object.freeze({
      id: segment.element(1),
      parentId: segment.element(2),
      levelCode: segment.element(3),
      childCode: segment.element(4),
      position: segment.position,
    });

    if (this.declared.has(node.id)) {
      this.report(segment, 'DuplicateHierarchicalId', `HL01 "${node.id}" was already declared`);
    }
    if (node.parentId !== '' && !this.declared.has(node.parentId)) {
      this.report(
        segment,
        'UnknownHierarchicalParent',
        `HL02 parent "${node.parentId}" of "${node.id}" was not declared earlier`
      );
    }

    this.declared.add(node.id);
    this.nodes.push(node);
  }

  private report(segment: Segment, code: HierarchyFinding['code'], message: string): void {
    this.findings.push({
      kind: 'HierarchyMismatch',
      code,
      position: segment.position,
      segmentId: segment.id,
      message,
    });
  }
}

/**
 * Children of a node in the HL forest ('' returns the roots).
 */
export function hierarchicalChildren(
  nodes: readonly HierarchicalNode[],
  parentId: string
): HierarchicalNode[] {
  return nodes.filter((node) => node.parentId === parentId);
}
