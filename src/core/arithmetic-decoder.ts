import { IntervalError } from '../errors.js';
import { openSession, type ModelSession, type ProbabilityModel } from '../model/types.js';
import { codeValue, type BinaryCode } from './binary-interval.js';
import { cdfInterval, findSymbol } from './cumulative-dist.js';
import { add, div, format, mul, sub, ZERO, ONE, type Rational } from './rational.js';

/**
 * Arithmetic decoder (must match encoder).
 *
 * The encoder leaves the code's dyadic interval inside the final message
 * interval, so its lower end 0.code lies inside every message interval
 * along the way. Each step picks the symbol whose slice contains it.
 *
 * Codes carry no terminator: the caller says how many symbols to read.
 */
export class ArithmeticDecoder {
  private low: Rational = ZERO;
  private high: Rational = ONE;
  private readonly point: Rational;
  private readonly session: ModelSession;

  constructor(model: ProbabilityModel, code: BinaryCode) {
    this.point = codeValue(code);
    this.session = openSession(model);
  }

  /**
   * Decode the next symbol.
   */
  decode(): string {
    const range = sub(this.high, this.low);
    const target = div(sub(this.point, this.low), range);
    if (target.n < 0n || target.n >= target.d) {
      throw new IntervalError(
        `Code value ${format(this.point)} is outside the message interval ` +
          `[${format(this.low)}, ${format(this.high)})`
      );
    }

    const distribution = this.session.current();
    const symbol = findSymbol(distribution, target);
    const { low: cdfLow, high: cdfHigh } = cdfInterval(distribution, symbol);

    const newLow = add(this.low, mul(range, cdfLow));
    this.high = add(this.low, mul(range, cdfHigh));
    this.low = newLow;
    this.session.observe(symbol);

    return symbol;
  }
}

/**
 * Decode `count` symbols from a code produced by `encode` under the same
 * model.
 */
export function decode(
  model: ProbabilityModel,
  code: BinaryCode,
  count: number
): string[] {
  if (!Number.isSafeInteger(count) || count < 0) {
    throw new RangeError(`Symbol count must be a non-negative integer, got ${count}`);
  }
  const decoder = new ArithmeticDecoder(model, code);
  const symbols: string[] = [];
  for (let i = 0; i < count; i++) {
    symbols.push(decoder.decode());
  }
  return symbols;
}
