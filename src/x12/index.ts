/**
 * X12 837P Engine
 *
 * Tokenizes X12 transactions, validates their envelope, detects claim and
 * service-line loops and extracts the claim model.
 */

// Errors
export {
  X12ParseError,
  MalformedEnvelopeError,
  MalformedInputError,
  InvalidDelimitersError,
  InvalidProfileError,
  isX12ParseError,
} from './X12Errors.js';
export type { X12ErrorCode } from './X12Errors.js';

// Delimiters
export {
  DEFAULT_X12_DELIMITERS,
  ISA_LENGTH,
  assertValidDelimiters,
  delimiterProblem,
  discoverDelimiters,
} from './X12Delimiters.js';
export type { X12Delimiters, LineSuffix } from './X12Delimiters.js';

// Tokenizer
export { Segment, renderSegments } from './Segment.js';
export { X12Tokenizer, tokenizeX12 } from './X12Tokenizer.js';
export type { X12TokenizerOptions, TokenizedTransaction } from './X12Tokenizer.js';

// Findings
export { sortFindings, formatFinding } from './Findings.js';
export type {
  X12Finding,
  EnvelopeFinding,
  EnvelopeFindingCode,
  HierarchyFinding,
  HierarchyFindingCode,
  DataQualityFinding,
} from './Findings.js';

// Envelope validation
export { EnvelopeValidator, validateEnvelope } from './EnvelopeValidator.js';

// Loop detection and extraction
export { LoopProfileSchema, PROFESSIONAL_837_PROFILE, parseLoopProfile } from './LoopProfile.js';
export type { LoopProfile } from './LoopProfile.js';
export { HierarchicalLoopWalker, hierarchicalChildren } from './HierarchicalLoopWalker.js';
export type {
  LoopKind,
  LoopSpan,
  SegmentRange,
  WalkerState,
  HierarchicalNode,
  WalkResult,
} from './HierarchicalLoopWalker.js';
export { ClaimExtractor } from './ClaimExtractor.js';
export type { ClaimExtraction } from './ClaimExtractor.js';
export { projectFlat, projectSegments } from './FlatProjector.js';

// Engine
export { X12ClaimsEngine, allFindings, extractClaimsFrom837P, x12ToFlatJson } from './X12ClaimsEngine.js';
export type { X12ClaimsEngineOptions, ClaimsResult, ValidationResult } from './X12ClaimsEngine.js';
