/**
 * Fatal X12 parse errors
 *
 * Thrown only when no segment sequence can be produced (or a caller-supplied
 * configuration value is unusable). Everything downstream of a successful
 * tokenization reports findings instead of throwing.
 */

export type X12ErrorCode =
  | 'MalformedEnvelope'
  | 'MalformedInput'
  | 'InvalidDelimiters'
  | 'InvalidProfile';

/**
 * Base class for errors that make a transaction unparseable.
 */
export class X12ParseError extends Error {
  constructor(
    message: string,
    public readonly code: X12ErrorCode
  ) {
    super(message);
    this.name = 'X12ParseError';
  }
}

/**
 * The interchange header is absent, too short, or not an ISA segment.
 */
export class MalformedEnvelopeError extends X12ParseError {
  constructor(message: string) {
    super(message, 'MalformedEnvelope');
    this.name = 'MalformedEnvelopeError';
  }
}

/**
 * The segment terminator never occurs in the text.
 */
export class MalformedInputError extends X12ParseError {
  constructor(message: string) {
    super(message, 'MalformedInput');
    this.name = 'MalformedInputError';
  }
}

/**
 * A caller-supplied delimiter set breaks the distinct/printable rule.
 */
export class InvalidDelimitersError extends X12ParseError {
  constructor(message: string) {
    super(message, 'InvalidDelimiters');
    this.name = 'InvalidDelimitersError';
  }
}

export class InvalidProfileError extends X12ParseError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message, 'InvalidProfile');
    this.name = 'InvalidProfileError';
  }
}

/**
 * Narrow an unknown thrown value to a fatal parse error.
 */
export function isX12ParseError(error: unknown): error is X12ParseError {
  return error instanceof X12ParseError;
}
