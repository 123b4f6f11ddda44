/**
 * X12 delimiter set and discovery from the ISA interchange header.
 *
 * X12 ISA segment format (fixed width, 106 characters):
 * ISA*00*          *00*          *ZZ*SENDER         *ZZ*RECEIVER       *210101*1200*^*00501*000000001*0*P*:~
 * Position 3: element separator
 * Position 104: component (sub-element) separator, ISA16
 * Position 105: segment terminator
 */

import { InvalidDelimitersError, MalformedEnvelopeError } from './X12Errors.js';

export const ISA_SEGMENT_ID = 'ISA';
export const ISA_LENGTH = 106;
export const ISA_ELEMENT_COUNT = 16;
export const ELEMENT_SEPARATOR_OFFSET = 3;
export const COMPONENT_SEPARATOR_OFFSET = 104;
export const SEGMENT_TERMINATOR_OFFSET = 105;

export type LineSuffix = '' | '\n' | '\r\n';

export interface X12Delimiters {
  readonly elementSeparator: string;
  readonly componentSeparator: string;
  readonly segmentTerminator: string;
  /** Line break written after each terminator; formatting only, never data */
  readonly lineSuffix: LineSuffix;
}

/**
 * Delimiters used by most 5010 senders.
 */
export const DEFAULT_X12_DELIMITERS: X12Delimiters = Object.freeze({
  elementSeparator: '*',
  componentSeparator: ':',
  segmentTerminator: '~',
  lineSuffix: '',
});

function isDelimiterCharacter(ch: string): boolean {
  if (ch.length !== 1) return false;
  const code = ch.charCodeAt(0);
  return code >= 0x21 && code <= 0x7e && !/[A-Za-z0-9]/.test(ch);
}

/**
 * Describe why a delimiter set is unusable, or return null when it is valid.
 */
export function delimiterProblem(delimiters: X12Delimiters): string | null {
  const { elementSeparator, componentSeparator, segmentTerminator } = delimiters;
  const named: Array<[string, string]> = [
    ['element separator', elementSeparator],
    ['component separator', componentSeparator],
    ['segment terminator', segmentTerminator],
  ];

  for (const [name, ch] of named) {
    if (!isDelimiterCharacter(ch)) {
      return `${name} ${JSON.stringify(ch)} is not a single printable non-alphanumeric character`;
    }
  }

  if (new Set([elementSeparator, componentSeparator, segmentTerminator]).size !== 3) {
    return `delimiters must be distinct (element ${JSON.stringify(elementSeparator)}, component ${JSON.stringify(componentSeparator)}, terminator ${JSON.stringify(segmentTerminator)})`;
  }

  return null;
}

/**
 * Validate a caller-supplied delimiter set.
 */
export function assertValidDelimiters(delimiters: X12Delimiters): X12Delimiters {
  const problem = delimiterProblem(delimiters);
  if (problem) {
    throw new InvalidDelimitersError(`Invalid delimiter set: ${problem}`);
  }
  return delimiters;
}

/**
 * Discover delimiters from the ISA header at the start of the text.
 * Leading whitespace must already have been removed.
 */
export function discoverDelimiters(text: string): X12Delimiters {
  if (!text.startsWith(ISA_SEGMENT_ID)) {
    throw new MalformedEnvelopeError(
      `Expected transaction to start with ${ISA_SEGMENT_ID}, found ${JSON.stringify(text.substring(0, 3))}`
    );
  }

  if (text.length < ISA_LENGTH) {
    throw new MalformedEnvelopeError(
      `${ISA_SEGMENT_ID} segment too short: ${text.length} characters, need at least ${ISA_LENGTH}`
    );
  }

  // ISA16 sits at offset 104 only when all 16 element separators precede it,
  // the last one at offset 103
  const elementSeparator = text.charAt(ELEMENT_SEPARATOR_OFFSET);
  const separators = text.substring(0, COMPONENT_SEPARATOR_OFFSET).split(elementSeparator).length - 1;
  if (text.charAt(COMPONENT_SEPARATOR_OFFSET - 1) !== elementSeparator || separators !== ISA_ELEMENT_COUNT) {
    throw new MalformedEnvelopeError(
      `${ISA_SEGMENT_ID} segment too short: expected ${ISA_ELEMENT_COUNT} element separators before offset ${COMPONENT_SEPARATOR_OFFSET}, found ${separators}`
    );
  }

  const after = text.substring(ISA_LENGTH, ISA_LENGTH + 2);
  const lineSuffix: LineSuffix = after.startsWith('\r\n') ? '\r\n' : after.startsWith('\n') ? '\n' : '';

  const delimiters: X12Delimiters = {
    elementSeparator,
    componentSeparator: text.charAt(COMPONENT_SEPARATOR_OFFSET),
    segmentTerminator: text.charAt(SEGMENT_TERMINATOR_OFFSET),
    lineSuffix,
  };

  const problem = delimiterProblem(delimiters);
  if (problem) {
    throw new MalformedEnvelopeError(`Cannot discover delimiters from ${ISA_SEGMENT_ID}: ${problem}`);
  }

  return delimiters;
}
