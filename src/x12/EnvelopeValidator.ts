/**
 * Envelope validator
 *
 * Checks ISA/IEA, GS/GE and ST/SE pairing, control numbers and counts.
 * Never throws: violations come back as findings and the segment sequence
 * stays usable.
 */

import type { EnvelopeFinding, EnvelopeFindingCode } from './Findings.js';
import { sortFindings } from './Findings.js';
import type { Segment } from './Segment.js';

interface EnvelopeLevel {
  header: string;
  trailer: string;
  depth: number;
  /** Header element holding the control number */
  headerControl: number;
  /** Trailer element repeating the control number */
  trailerControl: number;
  /** Trailer element 1 is a count: of child envelopes, or of segments for ST/SE */
  countCode: EnvelopeFindingCode;
  countsSegments: boolean;
}

const ENVELOPE_LEVELS: readonly EnvelopeLevel[] = [
  {
    header: 'ISA',
    trailer: 'IEA',
    depth: 0,
    headerControl: 13,
    trailerControl: 2,
    countCode: 'GroupCountMismatch',
    countsSegments: false,
  },
  {
    header: 'GS',
    trailer: 'GE',
    depth: 1,
    headerControl: 6,
    trailerControl: 2,
    countCode: 'TransactionCountMismatch',
    countsSegments: false,
  },
  {
    header: 'ST',
    trailer: 'SE',
    depth: 2,
    headerControl: 2,
    trailerControl: 2,
    countCode: 'SegmentCountMismatch',
    countsSegments: true,
  },
];

const BY_HEADER = new Map(ENVELOPE_LEVELS.map((level) => [level.header, level]));
const BY_TRAILER = new Map(ENVELOPE_LEVELS.map((level) => [level.trailer, level]));

interface OpenEnvelope {
  level: EnvelopeLevel;
  header: Segment;
  children: number;
}

function finding(code: EnvelopeFindingCode, segment: Segment, message: string): EnvelopeFinding {
  return {
    kind: 'EnvelopeMismatch',
    code,
    position: segment.position,
    segmentId: segment.id,
    message,
  };
}

function parseCount(value: string): number | null {
  const trimmed = value.trim();
  return /^\d+$/.test(trimmed) ? parseInt(trimmed, 10) : null;
}

export class EnvelopeValidator {
  /**
   * Validate the envelope structure of a tokenized transaction.
   * Findings are ordered by the position of the segment they concern.
   */
  validate(segments: readonly Segment[]): EnvelopeFinding[] {
    const findings: EnvelopeFinding[] = [];
    const stack: OpenEnvelope[] = [];

    const reportUnclosed = (open: OpenEnvelope): void => {
      findings.push(
        finding(
          'MissingTrailer',
          open.header,
          `${open.level.header} has no matching ${open.level.trailer}`
        )
      );
    };

    for (const segment of segments) {
      const headerLevel = BY_HEADER.get(segment.id);
      if (headerLevel) {
        // Anything still open at this depth or deeper was never terminated
        while (stack.length > 0 && (stack[stack.length - 1]?.level.depth ?? -1) >= headerLevel.depth) {
          const unclosed = stack.pop();
          if (unclosed) reportUnclosed(unclosed);
        }

        const parent = stack[stack.length - 1];
        if (headerLevel.depth > 0) {
          if (parent?.level.depth === headerLevel.depth - 1) {
            parent.children++;
          } else {
            const expected = ENVELOPE_LEVELS[headerLevel.depth - 1]?.header ?? '';
            findings.push(
              finding('MisplacedHeader', segment, `${segment.id} is not enclosed by an open ${expected}`)
            );
          }
        }
        stack.push({ level: headerLevel, header: segment, children: 0 });
        continue;
      }

      const trailerLevel = BY_TRAILER.get(segment.id);
      if (!trailerLevel) {
        continue;
      }

      const openIndex = this.findOpen(stack, trailerLevel);
      if (openIndex === -1) {
        findings.push(
          finding('UnmatchedTrailer', segment, `${segment.id} has no open ${trailerLevel.header}`)
        );
        continue;
      }

      while (stack.length - 1 > openIndex) {
        const unclosed = stack.pop();
        if (unclosed) reportUnclosed(unclosed);
      }
      const open = stack.pop();
      if (open) {
        findings.push(...this.checkPair(open, segment));
      }
    }

    while (stack.length > 0) {
      const unclosed = stack.pop();
      if (unclosed) reportUnclosed(unclosed);
    }

    return sortFindings(findings);
  }

  private findOpen(stack: readonly OpenEnvelope[], level: EnvelopeLevel): number {
    for (let i = stack.length - 1; i >= 0; i--) {
      if (stack[i]?.level === level) return i;
    }
    return -1;
  }

  private checkPair(open: OpenEnvelope, trailer: Segment): EnvelopeFinding[] {
    const { level, header } = open;
    const findings: EnvelopeFinding[] = [];

    const headerControl = header.element(level.headerControl).trim();
    const trailerControl = trailer.element(level.trailerControl).trim();
    if (headerControl !== trailerControl) {
      findings.push(
        finding(
          'ControlNumberMismatch',
          trailer,
          `${level.trailer}${String(level.trailerControl).padStart(2, '0')} control number "${trailerControl}" does not match ${level.header}${String(level.headerControl).padStart(2, '0')} "${headerControl}"`
        )
      );
    }

    const expected = level.countsSegments ? trailer.position - header.position + 1 : open.children;
    const declared = parseCount(trailer.element(1));
    if (declared !== expected) {
      const what = level.countsSegments ? 'segments' : level === ENVELOPE_LEVELS[0] ? 'functional groups' : 'transaction sets';
      findings.push(
        finding(
          level.countCode,
          trailer,
          `${level.trailer}01 declares ${JSON.stringify(trailer.element(1))} ${what}, found ${expected}`
        )
      );
    }

    return findings;
  }
}

/**
 * Validate envelope structure (convenience function)
 */
export function validateEnvelope(segments: readonly Segment[]): EnvelopeFinding[] {
  return new EnvelopeValidator().validate(segments);
}
