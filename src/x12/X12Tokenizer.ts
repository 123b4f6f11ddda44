/**
 * X12 tokenizer
 *
 * Splits raw transaction text into an ordered sequence of segments using
 * delimiters discovered from the ISA header (or supplied by the caller).
 */

import { getLogger, registerComponent } from '../logging/index.js';
import { Segment } from './Segment.js';
import { assertValidDelimiters, discoverDelimiters } from './X12Delimiters.js';
import type { X12Delimiters } from './X12Delimiters.js';
import { MalformedInputError } from './X12Errors.js';

registerComponent('x12-tokenizer', 'X12 segment tokenizer');

export interface X12TokenizerOptions {
  /** Skip ISA discovery and use these delimiters */
  delimiters?: X12Delimiters;
}

export interface TokenizedTransaction {
  readonly delimiters: X12Delimiters;
  readonly segments: readonly Segment[];
}

const LEADING_LINE_BREAKS = /^[\r\n]+/;
/** UTF-8 byte-order mark, decoded either as UTF-8 or byte-for-byte as latin1 */
const BYTE_ORDER_MARK = /^(?:\uFEFF|\u00EF\u00BB\u00BF)/;

export class X12Tokenizer {
  private readonly suppliedDelimiters: X12Delimiters | null;
  private readonly logger = getLogger('x12-tokenizer');

  constructor(options?: X12TokenizerOptions) {
    this.suppliedDelimiters = options?.delimiters ? assertValidDelimiters(options.delimiters) : null;
  }

  /**
   * Tokenize a complete transaction.
   *
   * @throws MalformedEnvelopeError when delimiters cannot be discovered
   * @throws MalformedInputError when the text never contains the segment terminator
   */
  tokenize(source: string): TokenizedTransaction {
    const text = source.trimStart().replace(BYTE_ORDER_MARK, '').trimStart();

    if (!text) {
      throw new MalformedInputError('Unable to tokenize, transaction text is empty');
    }

    const delimiters = this.suppliedDelimiters ?? discoverDelimiters(text);

    if (!text.includes(delimiters.segmentTerminator)) {
      throw new MalformedInputError(
        `Segment terminator ${JSON.stringify(delimiters.segmentTerminator)} not found in transaction text`
      );
    }

    const segments: Segment[] = [];
    for (const fragment of this.splitFragments(text, delimiters.segmentTerminator)) {
      const parts = fragment.split(delimiters.elementSeparator);
      const id = parts[0] ?? '';
      segments.push(new Segment(id, parts.slice(1), segments.length, delimiters.componentSeparator));
    }

    this.logger.debug('Tokenized transaction', {
      segmentCount: segments.length,
      elementSeparator: delimiters.elementSeparator,
      componentSeparator: delimiters.componentSeparator,
      segmentTerminator: delimiters.segmentTerminator,
    });

    return { delimiters, segments };
  }

  /**
   * Non-empty segment strings, with line breaks after a terminator removed.
   */
  private splitFragments(text: string, terminator: string): string[] {
    const fragments: string[] = [];
    for (const raw of text.split(terminator)) {
      const fragment = raw.replace(LEADING_LINE_BREAKS, '');
      if (fragment.trim()) {
        fragments.push(fragment);
      }
    }
    return fragments;
  }
}

/**
 * Tokenize X12 text (convenience function)
 */
export function tokenizeX12(source: string, options?: X12TokenizerOptions): TokenizedTransaction {
  return new X12Tokenizer(options).tokenize(source);
}
