/**
 * Loop profile
 *
 * Immutable configuration naming the segments that drive loop detection and
 * claim extraction. Passed to the walker and extractor at construction so
 * several transaction-set profiles can coexist in one process.
 */

import { z } from 'zod';
import { InvalidProfileError } from './X12Errors.js';

const SegmentIdSchema = z
  .string()
  .regex(/^[A-Z0-9]{2,3}$/, 'segment identifiers are 2-3 uppercase letters or digits');

export const LoopProfileSchema = z
  .object({
    name: z.string().min(1),
    transactionHeader: SegmentIdSchema.default('ST'),
    transactionTrailer: SegmentIdSchema.default('SE'),
    hierarchicalLevel: SegmentIdSchema.default('HL'),
    claimTrigger: SegmentIdSchema,
    serviceLineTrigger: SegmentIdSchema,
    serviceSegment: SegmentIdSchema,
  })
  .strict()
  .refine((p) => new Set([p.hierarchicalLevel, p.claimTrigger, p.serviceLineTrigger]).size === 3, {
    message: 'hierarchicalLevel, claimTrigger and serviceLineTrigger must differ',
  });

export type LoopProfile = Readonly<z.output<typeof LoopProfileSchema>>;

/**
 * 837 Professional: 2300 claim loop starts at CLM, 2400 service line at LX, SV1 carries the line.
 */
export const PROFESSIONAL_837_PROFILE: LoopProfile = Object.freeze({
  name: '837P',
  transactionHeader: 'ST',
  transactionTrailer: 'SE',
  hierarchicalLevel: 'HL',
  claimTrigger: 'CLM',
  serviceLineTrigger: 'LX',
  serviceSegment: 'SV1',
});

/**
 * Validate an untrusted profile value (e.g. parsed from a JSON file).
 */
export function parseLoopProfile(value: unknown): LoopProfile {
  const result = LoopProfileSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    });
    throw new InvalidProfileError(`Invalid loop profile: ${issues.join('; ')}`, issues);
  }
  return Object.freeze(result.data);
}
