import { EncoderStateError, PrecisionOverflowError } from '../errors.js';
import { openSession, type ModelSession, type ProbabilityModel } from '../model/types.js';
import { extendAround, extendInside, type BinaryCode } from './binary-interval.js';
import { cdfInterval } from './cumulative-dist.js';
import { add, bitLength, midpoint, mul, sub, ZERO, ONE, type Rational } from './rational.js';

/**
 * Encoder lifecycle. `finalized` is terminal: the code no longer changes.
 */
export type EncoderState = 'initial' | 'narrowing' | 'finalized';

/**
 * Progress information callback payload.
 */
export interface ProgressInfo {
  stage: 'encoding' | 'decoding';
  current: number;
  /** Known when the stream has a length (arrays and strings). */
  total?: number;
}

export interface EncoderOptions {
  /**
   * Largest denominator, in bits, the message interval may reach. Exceeding
   * it throws PrecisionOverflowError. Default: unbounded.
   */
  maxPrecisionBits?: number;
}

export interface EncodeOptions extends EncoderOptions {
  /** Called after each encoded symbol. */
  onProgress?: (progress: ProgressInfo) => void;
}

/**
 * Extend `code` until its dyadic interval lies inside the upper half of
 * [low, high). For the untouched interval [0, 1) this gives "1".
 */
export function finalizeCode(
  code: BinaryCode,
  low: Rational,
  high: Rational
): BinaryCode {
  return extendInside(code, midpoint(low, high), high);
}

/**
 * Arithmetic encoder over exact rational intervals.
 *
 * The message interval [low, high) starts as [0, 1) and narrows by each
 * symbol's cumulative slice. The code is kept as the longest bit string
 * whose dyadic interval still surrounds the message interval, so bits
 * are only ever appended.
 */
export class ArithmeticEncoder {
  private low: Rational = ZERO;
  private high: Rational = ONE;
  private bits: BinaryCode = '';
  private count: number = 0;
  private phase: EncoderState = 'initial';
  private readonly session: ModelSession;
  private readonly maxPrecisionBits: number;

  constructor(model: ProbabilityModel, options: EncoderOptions = {}) {
    this.session = openSession(model);
    this.maxPrecisionBits = options.maxPrecisionBits ?? Infinity;
  }

  get state(): EncoderState {
    return this.phase;
  }

  /** Code emitted so far; final once the encoder is finalized. */
  get code(): BinaryCode {
    return this.bits;
  }

  get interval(): { low: Rational; high: Rational } {
    return { low: this.low, high: this.high };
  }

  get symbolCount(): number {
    return this.count;
  }

  /**
   * Encode one symbol. On error the encoder keeps its previous state.
   */
  encode(symbol: string): void {
    this.ensureOpen();

    const { low: cdfLow, high: cdfHigh } = cdfInterval(
      this.session.current(),
      symbol
    );

    const range = sub(this.high, this.low);
    const newLow = add(this.low, mul(range, cdfLow));
    const newHigh = add(this.low, mul(range, cdfHigh));

    const precision = Math.max(bitLength(newLow.d), bitLength(newHigh.d));
    if (precision > this.maxPrecisionBits) {
      throw new PrecisionOverflowError(precision, this.maxPrecisionBits);
    }

    this.bits = extendAround(this.bits, newLow, newHigh);
    this.low = newLow;
    this.high = newHigh;
    this.session.observe(symbol);
    this.count++;
    this.phase = 'narrowing';
  }

  /**
   * Finalize encoding: extend the code until its interval sits inside the
   * upper half of the message interval. Decoders rely on this convention.
   */
  finish(): BinaryCode {
    this.ensureOpen();
    this.bits = finalizeCode(this.bits, this.low, this.high);
    this.phase = 'finalized';
    return this.bits;
  }

  private ensureOpen(): void {
    if (this.phase === 'finalized') {
      throw new EncoderStateError('Encoder is finalized; start a new one');
    }
  }
}

/**
 * Arithmetically encode a symbol stream under a model.
 *
 * @example
 * ```typescript
 * encode(dirichlet({ a: 1, b: 1, c: 1 }), 'aabbaacc'); // '00011110011110010'
 * ```
 */
export function encode(
  model: ProbabilityModel,
  stream: Iterable<string>,
  options: EncodeOptions = {}
): BinaryCode {
  const symbols = typeof stream === 'string' ? Array.from(stream) : stream;
  const total = Array.isArray(symbols) ? symbols.length : undefined;
  const encoder = new ArithmeticEncoder(model, options);

  for (const symbol of symbols) {
    encoder.encode(symbol);
    options.onProgress?.({
      stage: 'encoding',
      current: encoder.symbolCount,
      total,
    });
  }

  return encoder.finish();
}
