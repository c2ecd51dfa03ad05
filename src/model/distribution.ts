import { InvalidPriorError } from '../errors.js';
import { rational, type Rational } from '../core/rational.js';
import type { Alphabet } from './alphabet.js';

/**
 * Probability distribution over an alphabet.
 *
 * Probabilities are exact rationals `weight / total`, so they are strictly
 * positive wherever the weight is, and sum to exactly 1.
 */
export class Distribution {
  readonly alphabet: Alphabet;
  private readonly weights: readonly bigint[];
  readonly total: bigint;

  /**
   * @param weights - One non-negative weight per alphabet symbol, in
   *   alphabet order. At least one must be positive.
   */
  constructor(alphabet: Alphabet, weights: readonly bigint[]) {
    if (weights.length !== alphabet.size) {
      throw new InvalidPriorError(
        `Expected ${alphabet.size} weights, got ${weights.length}`
      );
    }
    let total = 0n;
    for (let i = 0; i < weights.length; i++) {
      if (weights[i] < 0n) {
        throw new InvalidPriorError(
          `Negative weight ${weights[i]} for symbol ${JSON.stringify(alphabet.symbols[i])}`,
          alphabet.symbols[i]
        );
      }
      total += weights[i];
    }
    if (total === 0n) {
      throw new InvalidPriorError('Distribution weights sum to zero');
    }

    this.alphabet = alphabet;
    this.weights = weights.slice();
    this.total = total;
  }

  /**
   * Unnormalized weight of a symbol.
   */
  weight(symbol: string): bigint {
    return this.weights[this.alphabet.indexOf(symbol)];
  }

  /**
   * Weight of the symbol at a position in alphabet order.
   */
  weightAt(index: number): bigint {
    const w = this.weights[index];
    if (w === undefined) {
      throw new RangeError(`No symbol at index ${index}`);
    }
    return w;
  }

  /**
   * P(symbol), exact.
   */
  probability(symbol: string): Rational {
    return rational(this.weight(symbol), this.total);
  }

  /**
   * Symbols with their probabilities, in alphabet order.
   */
  *entries(): IterableIterator<[string, Rational]> {
    const { symbols } = this.alphabet;
    for (let i = 0; i < symbols.length; i++) {
      yield [symbols[i], rational(this.weights[i], this.total)];
    }
  }

  /**
   * Plain-object view with float probabilities, for display.
   */
  toJSON(): Record<string, number> {
    const out: Record<string, number> = {};
    const { symbols } = this.alphabet;
    for (let i = 0; i < symbols.length; i++) {
      out[symbols[i]] = Number(this.weights[i]) / Number(this.total);
    }
    return out;
  }
}
