/**
 * Claim extractor
 *
 * Projects the segments inside each claim loop into a Claim and the service
 * line loops nested in it into ServiceLines. Missing values come through as ''
 * and are reported as data-quality findings; extraction never aborts.
 */

import { createClaim } from '../model/Claim.js';
import type { Claim, ServiceLine } from '../model/Claim.js';
import type { DataQualityFinding } from './Findings.js';
import type { LoopSpan } from './HierarchicalLoopWalker.js';
import { PROFESSIONAL_837_PROFILE } from './LoopProfile.js';
import type { LoopProfile } from './LoopProfile.js';
import type { Segment } from './Segment.js';

export interface ClaimExtraction {
  /** Ordered by claim loop start position */
  readonly claims: readonly Claim[];
  readonly findings: readonly DataQualityFinding[];
}

const CHARGE_ELEMENT = 2;
const SHIFTED_CHARGE_ELEMENT = 3;
const AMOUNT = /^-?\d+(\.\d+)?$/;

function contains(outer: LoopSpan, inner: LoopSpan): boolean {
  return outer.start <= inner.start && inner.start < inner.end && inner.end <= outer.end;
}

export class ClaimExtractor {
  constructor(private readonly profile: LoopProfile = PROFESSIONAL_837_PROFILE) {}

  extract(segments: readonly Segment[], spans: readonly LoopSpan[]): ClaimExtraction {
    const claimSpans = spans
      .filter((span) => span.kind === 'ClaimLoop')
      .sort((a, b) => a.start - b.start);
    const lineSpans = spans
      .filter((span) => span.kind === 'ServiceLineLoop')
      .sort((a, b) => a.start - b.start);

    const claims: Claim[] = [];
    const findings: DataQualityFinding[] = [];

    for (const claimSpan of claimSpans) {
      const trigger = segments[claimSpan.start];
      const clm = trigger?.id === this.profile.claimTrigger ? trigger : undefined;
      const claimId = clm?.element(1) ?? '';
      const totalCharge = clm?.element(2) ?? '';

      const report = (
        kind: DataQualityFinding['kind'],
        segment: Segment | undefined,
        position: number,
        message: string,
        field?: string
      ): void => {
        findings.push({
          kind,
          position: segment?.position ?? position,
          segmentId: segment?.id ?? '',
          ...(field ? { field } : {}),
          claimId,
          message,
        });
      };

      if (!claimId) {
        report('MissingField', clm, claimSpan.start, 'claim has no identifier', `${this.profile.claimTrigger}01`);
      }
      if (!totalCharge) {
        report('MissingField', clm, claimSpan.start, 'claim has no total charge', `${this.profile.claimTrigger}02`);
      }

      const serviceLines: ServiceLine[] = [];
      for (const lineSpan of lineSpans) {
        if (!contains(claimSpan, lineSpan)) continue;

        const service = this.findServiceSegment(segments, lineSpan);
        if (!service) {
          report(
            'MissingServiceSegment',
            segments[lineSpan.start],
            lineSpan.start,
            `service line has no ${this.profile.serviceSegment} segment`
          );
          continue;
        }

        const charge = this.lineCharge(service);
        const line: ServiceLine = {
          procedureCode: service.components(1).slice(0, 2).join(service.componentSeparator),
          lineCharge: charge.value,
        };
        if (!line.procedureCode) {
          report('MissingField', service, lineSpan.start, 'service line has no procedure code', `${service.id}01`);
        }
        if (charge.index !== CHARGE_ELEMENT) {
          const message = charge.value
            ? `${service.id}02 is empty; charge taken from ${service.id}${String(charge.index).padStart(2, '0')}`
            : 'service line has no charge';
          report('MissingField', service, lineSpan.start, message, `${service.id}02`);
        }
        serviceLines.push(line);
      }

      claims.push(createClaim(claimId, totalCharge, serviceLines));
    }

    return { claims, findings };
  }

  /**
   * Line charge from element 2. When it is empty and element 3 holds an amount,
   * the charge was shifted one element right (SV1*HC:99213**100**1) and element 3
   * is used. Anything else, such as a unit code, leaves the charge empty.
   */
  private lineCharge(service: Segment): { value: string; index: number } {
    const declared = service.element(CHARGE_ELEMENT);
    if (declared) {
      return { value: declared, index: CHARGE_ELEMENT };
    }
    const shifted = service.element(SHIFTED_CHARGE_ELEMENT);
    if (AMOUNT.test(shifted)) {
      return { value: shifted, index: SHIFTED_CHARGE_ELEMENT };
    }
    return { value: '', index: -1 };
  }

  /**
   * First service segment anywhere inside the span, not necessarily its trigger.
   */
  private findServiceSegment(segments: readonly Segment[], span: LoopSpan): Segment | undefined {
    for (let i = span.start; i < span.end; i++) {
      const segment = segments[i];
      if (segment?.id === this.profile.serviceSegment) {
        return segment;
      }
    }
    return undefined;
  }
}
