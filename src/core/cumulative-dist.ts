/**
 * Cumulative distribution intervals for arithmetic coding.
 *
 * A symbol owns the half-open slice [F(a'), F(a)) of [0, 1), where F is the
 * cumulative probability in alphabet order and a' is the symbol preceding a.
 */

import { IntervalError } from '../errors.js';
import type { Distribution } from '../model/distribution.js';
import { format, rational, lt, ZERO, ONE, type Rational } from './rational.js';

export interface CdfInterval {
  low: Rational;
  high: Rational;
}

/**
 * Get the cumulative probability interval for a specific symbol.
 *
 * @returns [low, high) where low is the mass of all preceding symbols and
 *          high = low + P(symbol)
 * @throws UnknownSymbolError if the symbol is not in the distribution
 */
export function cdfInterval(
  distribution: Distribution,
  symbol: string
): CdfInterval {
  const { alphabet, total } = distribution;
  const position = alphabet.indexOf(symbol);

  // Integer prefix sum over the shared denominator.
  let before = 0n;
  for (let i = 0; i < position; i++) {
    before += distribution.weightAt(i);
  }
  const after = before + distribution.weightAt(position);

  return {
    low: rational(before, total),
    high: rational(after, total),
  };
}

/**
 * Find which symbol a value falls into.
 *
 * @param target - Point in [0, 1)
 * @returns The symbol whose [low, high) contains target
 */
export function findSymbol(distribution: Distribution, target: Rational): string {
  if (lt(target, ZERO) || !lt(target, ONE)) {
    throw new IntervalError(`Target ${format(target)} is outside [0, 1)`);
  }

  const { alphabet, total } = distribution;
  // target < cumulative / total  <=>  target.n * total < cumulative * target.d
  let cumulative = 0n;
  for (let i = 0; i < alphabet.size; i++) {
    cumulative += distribution.weightAt(i);
    if (target.n * total < cumulative * target.d) {
      return alphabet.symbols[i];
    }
  }

  // Unreachable: cumulative ends at total and target < 1.
  throw new IntervalError(`No symbol covers ${format(target)}`);
}
