/**
 * Error hierarchy for arithmetic coding.
 *
 * Every failure aborts the current encode/decode call; none of them is
 * retried, since the input itself is at fault. Callers distinguish the
 * kinds with `instanceof` or by the stable `code` string.
 *
 * @example
 * ```typescript
 * try {
 *   encode(model, 'abz');
 * } catch (error) {
 *   if (error instanceof UnknownSymbolError) {
 *     console.error(`Not in the alphabet: ${error.symbol}`);
 *   }
 * }
 * ```
 */

export type ErrorCode =
  | 'UNKNOWN_SYMBOL'
  | 'INVALID_PRIOR'
  | 'PRECISION_OVERFLOW'
  | 'INVALID_INTERVAL'
  | 'ENCODER_STATE'
  | 'INVALID_FORMAT';

/**
 * Base class for all errors raised by this package.
 */
export abstract class ArithmeticCodingError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A symbol was requested that the model's alphabet does not contain.
 */
export class UnknownSymbolError extends ArithmeticCodingError {
  readonly code = 'UNKNOWN_SYMBOL';

  constructor(public readonly symbol: string) {
    super(`Symbol ${JSON.stringify(symbol)} is not in the model's alphabet`);
  }
}

/**
 * A prior count map is empty or holds a count that is not a positive integer.
 */
export class InvalidPriorError extends ArithmeticCodingError {
  readonly code = 'INVALID_PRIOR';

  constructor(
    message: string,
    public readonly symbol?: string
  ) {
    super(message);
  }
}

/**
 * The message interval outgrew the configured precision bound.
 */
export class PrecisionOverflowError extends ArithmeticCodingError {
  readonly code = 'PRECISION_OVERFLOW';

  constructor(
    public readonly bits: number,
    public readonly limit: number
  ) {
    super(
      `Message interval needs ${bits} bits of precision (limit: ${limit})`
    );
  }
}

/**
 * An interval or binary code argument is malformed, or a code extension
 * cannot reach its target.
 */
export class IntervalError extends ArithmeticCodingError {
  readonly code = 'INVALID_INTERVAL';
}

/**
 * An encoder or decoder was used after it reached a terminal state.
 */
export class EncoderStateError extends ArithmeticCodingError {
  readonly code = 'ENCODER_STATE';
}

/**
 * Container bytes could not be parsed.
 */
export class FormatError extends ArithmeticCodingError {
  readonly code = 'INVALID_FORMAT';
}
