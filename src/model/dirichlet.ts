import { InvalidPriorError } from '../errors.js';
import { Alphabet } from './alphabet.js';
import { Distribution } from './distribution.js';
import type { ModelSession, ProbabilityModel } from './types.js';

/**
 * Prior pseudo-counts, one positive integer per symbol.
 */
export type PriorCounts =
  | Readonly<Record<string, number | bigint>>
  | ReadonlyMap<string, number | bigint>;

function toCount(symbol: string, value: number | bigint): bigint {
  if (typeof value === 'bigint') {
    if (value > 0n) return value;
  } else if (Number.isSafeInteger(value) && value > 0) {
    return BigInt(value);
  }
  throw new InvalidPriorError(
    `Prior count for symbol ${JSON.stringify(symbol)} must be a positive integer, got ${String(value)}`,
    symbol
  );
}

function isPriorMap(
  priors: PriorCounts
): priors is ReadonlyMap<string, number | bigint> {
  return priors instanceof Map;
}

function priorEntries(priors: PriorCounts): Array<[string, number | bigint]> {
  return isPriorMap(priors)
    ? Array.from(priors.entries())
    : Object.entries(priors);
}

/**
 * Adaptive frequency model with a Dirichlet prior.
 *
 * P(x | history) = (prior(x) + occurrences of x in history) / total.
 * Every probability is strictly positive since priors are.
 */
export class DirichletModel implements ProbabilityModel {
  readonly alphabet: Alphabet;
  private readonly priors: readonly bigint[];

  constructor(priors: PriorCounts) {
    const entries = priorEntries(priors);
    if (entries.length === 0) {
      throw new InvalidPriorError('Prior counts must name at least one symbol');
    }

    const counts = new Map<string, bigint>();
    for (const [symbol, value] of entries) {
      counts.set(symbol, toCount(symbol, value));
    }

    this.alphabet = new Alphabet(counts.keys());
    this.priors = this.alphabet.symbols.map((symbol) => counts.get(symbol) ?? 0n);
  }

  /**
   * Prior counts in alphabet order, as a plain object.
   */
  priorCounts(): Record<string, bigint> {
    const out: Record<string, bigint> = {};
    this.alphabet.symbols.forEach((symbol, i) => {
      out[symbol] = this.priors[i];
    });
    return out;
  }

  distribution(history: readonly string[]): Distribution {
    const counts = this.priors.slice();
    for (const symbol of history) {
      counts[this.alphabet.indexOf(symbol)] += 1n;
    }
    return new Distribution(this.alphabet, counts);
  }

  session(): ModelSession {
    return new DirichletSession(this.alphabet, this.priors);
  }
}

/**
 * Running counts for one message, so each step costs O(|alphabet|)
 * instead of replaying the history.
 */
class DirichletSession implements ModelSession {
  private readonly counts: bigint[];
  private cached: Distribution | null = null;

  constructor(
    private readonly alphabet: Alphabet,
    priors: readonly bigint[]
  ) {
    this.counts = priors.slice();
  }

  current(): Distribution {
    if (this.cached === null) {
      this.cached = new Distribution(this.alphabet, this.counts);
    }
    return this.cached;
  }

  observe(symbol: string): void {
    this.counts[this.alphabet.indexOf(symbol)] += 1n;
    this.cached = null;
  }
}

/**
 * Build a Dirichlet model from prior counts.
 *
 * @example
 * ```typescript
 * const model = dirichlet({ a: 1, b: 1, c: 1 });
 * encode(model, 'aabbaacc'); // '00011110011110010'
 * ```
 */
export function dirichlet(priors: PriorCounts): DirichletModel {
  return new DirichletModel(priors);
}
