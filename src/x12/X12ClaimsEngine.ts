/**
 * X12 claims engine
 *
 * Runs the pipeline for one transaction:
 * text -> tokenizer -> envelope validator -> loop walker -> claim extractor.
 * The flat projection reads the tokenizer output directly.
 *
 * Fatal: X12ParseError (transaction unparseable, skip it).
 * Non-fatal: findings returned alongside the claims.
 */

import { getLogger, registerComponent } from '../logging/index.js';
import type { Claim } from '../model/Claim.js';
import type { FlatDocument } from '../model/records.js';
import { ClaimExtractor } from './ClaimExtractor.js';
import { EnvelopeValidator } from './EnvelopeValidator.js';
import { sortFindings } from './Findings.js';
import type { DataQualityFinding, EnvelopeFinding, HierarchyFinding, X12Finding } from './Findings.js';
import { projectFlat } from './FlatProjector.js';
import { HierarchicalLoopWalker } from './HierarchicalLoopWalker.js';
import type { WalkResult } from './HierarchicalLoopWalker.js';
import { PROFESSIONAL_837_PROFILE } from './LoopProfile.js';
import type { LoopProfile } from './LoopProfile.js';
import type { Segment } from './Segment.js';
import type { X12Delimiters } from './X12Delimiters.js';
import { X12Tokenizer } from './X12Tokenizer.js';
import type { TokenizedTransaction } from './X12Tokenizer.js';

registerComponent('x12-engine', 'X12 claim extraction pipeline');

export interface X12ClaimsEngineOptions {
  profile?: LoopProfile;
  /** Use these delimiters instead of discovering them from ISA */
  delimiters?: X12Delimiters;
}

export interface ClaimsResult {
  readonly claims: readonly Claim[];
  readonly envelopeFindings: readonly EnvelopeFinding[];
  readonly hierarchyFindings: readonly HierarchyFinding[];
  readonly dataQualityFindings: readonly DataQualityFinding[];
  readonly delimiters: X12Delimiters;
  readonly segmentCount: number;
}

export interface ValidationResult {
  readonly findings: readonly X12Finding[];
  readonly segmentCount: number;
  readonly claimCount: number;
}

export class X12ClaimsEngine {
  private readonly profile: LoopProfile;
  private readonly tokenizer: X12Tokenizer;
  private readonly validator = new EnvelopeValidator();
  private readonly walker: HierarchicalLoopWalker;
  private readonly extractor: ClaimExtractor;
  private readonly logger = getLogger('x12-engine');

  constructor(options?: X12ClaimsEngineOptions) {
    this.profile = options?.profile ?? PROFESSIONAL_837_PROFILE;
    this.tokenizer = new X12Tokenizer({ delimiters: options?.delimiters });
    this.walker = new HierarchicalLoopWalker(this.profile);
    this.extractor = new ClaimExtractor(this.profile);
  }

  getProfile(): LoopProfile {
    return this.profile;
  }

  tokenize(text: string): TokenizedTransaction {
    return this.tokenizer.tokenize(text);
  }

  validateEnvelope(segments: readonly Segment[]): EnvelopeFinding[] {
    return this.validator.validate(segments);
  }

  walk(segments: readonly Segment[]): WalkResult {
    return this.walker.walk(segments);
  }

  /**
   * Extract claims and every finding from one transaction.
   *
   * @throws X12ParseError when the text cannot be tokenized
   */
  extractClaims(text: string): ClaimsResult {
    const { delimiters, segments } = this.tokenize(text);
    const envelopeFindings = this.validateEnvelope(segments);
    const walked = this.walk(segments);
    const extraction = this.extractor.extract(segments, walked.spans);

    const result: ClaimsResult = {
      claims: extraction.claims,
      envelopeFindings,
      hierarchyFindings: walked.findings,
      dataQualityFindings: extraction.findings,
      delimiters,
      segmentCount: segments.length,
    };

    const findingCount = allFindings(result).length;
    this.logger.info(`Extracted ${result.claims.length} claim(s) from ${segments.length} segment(s)`, {
      profile: this.profile.name,
      findings: findingCount,
    });
    if (findingCount > 0) {
      this.logger.warn(`Transaction parsed with ${findingCount} finding(s)`, {
        envelope: envelopeFindings.length,
        hierarchy: walked.findings.length,
        dataQuality: extraction.findings.length,
      });
    }

    return result;
  }

  /**
   * Envelope, hierarchy and data-quality findings without building output records.
   */
  validate(text: string): ValidationResult {
    const result = this.extractClaims(text);
    return {
      findings: allFindings(result),
      segmentCount: result.segmentCount,
      claimCount: result.claims.length,
    };
  }

  /**
   * @param file source identifier copied into the document
   */
  projectFlat(text: string, file: string): FlatDocument {
    const { segments } = this.tokenize(text);
    this.logger.debug(`Projected ${segments.length} segment(s)`, { file });
    return projectFlat(file, segments);
  }
}

/**
 * All findings of a result, ordered by segment position.
 */
export function allFindings(result: ClaimsResult): X12Finding[] {
  return sortFindings<X12Finding>([
    ...result.envelopeFindings,
    ...result.hierarchyFindings,
    ...result.dataQualityFindings,
  ]);
}

/**
 * Extract claims from 837P text with the default profile (convenience function)
 */
export function extractClaimsFrom837P(text: string): readonly Claim[] {
  return new X12ClaimsEngine().extractClaims(text).claims;
}

/**
 * Flat projection with the default settings (convenience function)
 */
export function x12ToFlatJson(text: string, file: string): FlatDocument {
  return new X12ClaimsEngine().projectFlat(text, file);
}
