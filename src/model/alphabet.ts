import { InvalidPriorError, UnknownSymbolError } from '../errors.js';

/**
 * Compare two symbols by Unicode code point, lexicographically.
 *
 * Plain `<` on JS strings compares UTF-16 code units, which orders astral
 * characters differently from code-point order.
 */
export function compareSymbols(a: string, b: string): number {
  const ca = Array.from(a);
  const cb = Array.from(b);
  const len = Math.min(ca.length, cb.length);
  for (let i = 0; i < len; i++) {
    const x = ca[i].codePointAt(0) ?? 0;
    const y = cb[i].codePointAt(0) ?? 0;
    if (x !== y) return x - y;
  }
  return ca.length - cb.length;
}

/**
 * A finite set of symbols with a fixed total order.
 *
 * The order decides where each symbol's sub-interval falls inside [0, 1),
 * so it is computed once here and never re-derived.
 */
export class Alphabet implements Iterable<string> {
  readonly symbols: readonly string[];
  private readonly index: ReadonlyMap<string, number>;

  constructor(symbols: Iterable<string>) {
    const sorted = Array.from(new Set(symbols)).sort(compareSymbols);
    if (sorted.length === 0) {
      throw new InvalidPriorError('Alphabet must contain at least one symbol');
    }
    this.symbols = sorted;
    this.index = new Map(sorted.map((symbol, i) => [symbol, i]));
  }

  get size(): number {
    return this.symbols.length;
  }

  has(symbol: string): boolean {
    return this.index.has(symbol);
  }

  /**
   * Position of a symbol in the alphabet order.
   */
  indexOf(symbol: string): number {
    const i = this.index.get(symbol);
    if (i === undefined) {
      throw new UnknownSymbolError(symbol);
    }
    return i;
  }

  [Symbol.iterator](): Iterator<string> {
    return this.symbols[Symbol.iterator]();
  }
}
