/**
 * Flat projector
 *
 * Structure-free view of a tokenized transaction: every segment in source
 * order, envelope included, with no filtering and no interpretation.
 */

import type { FlatDocument, FlatSegmentRecord } from '../model/records.js';
import type { Segment } from './Segment.js';

export function projectSegments(segments: readonly Segment[]): FlatSegmentRecord[] {
  return segments.map((segment) => ({
    segment_id: segment.id,
    elements: [...segment.elements],
  }));
}

/**
 * @param file caller-supplied source identifier, copied through unchanged
 */
export function projectFlat(file: string, segments: readonly Segment[]): FlatDocument {
  return {
    file,
    segments: projectSegments(segments),
  };
}
