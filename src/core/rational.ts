/**
 * Exact rational arithmetic using native BigInt.
 *
 * Message interval bounds are carried as rationals so that every
 * containment test between an interval and a dyadic interval is exact,
 * regardless of how many symbols have been encoded.
 */

/** Exact rational: n / d, with d > 0, in lowest terms. */
export interface Rational {
  readonly n: bigint;
  readonly d: bigint;
}

export const ZERO: Rational = { n: 0n, d: 1n };
export const ONE: Rational = { n: 1n, d: 1n };

// -- internal helpers -------------------------------------------------------

function bigAbs(x: bigint): bigint {
  return x < 0n ? -x : x;
}

function gcd(a: bigint, b: bigint): bigint {
  a = bigAbs(a);
  b = bigAbs(b);
  while (b !== 0n) {
    const t = b;
    b = a % b;
    a = t;
  }
  return a;
}

/** Reduce to lowest terms, positive denominator. */
function reduce(n: bigint, d: bigint): Rational {
  if (d === 0n) throw new RangeError('division by zero');
  if (n === 0n) return ZERO;
  const g = gcd(n, d);
  const rn = n / g;
  const rd = d / g;
  return rd < 0n ? { n: -rn, d: -rd } : { n: rn, d: rd };
}

// -- construction -----------------------------------------------------------

export function rational(n: bigint | number, d: bigint | number = 1n): Rational {
  return reduce(BigInt(n), BigInt(d));
}

export function fromInteger(n: bigint | number): Rational {
  return { n: BigInt(n), d: 1n };
}

// -- arithmetic -------------------------------------------------------------

export function add(a: Rational, b: Rational): Rational {
  return reduce(a.n * b.d + b.n * a.d, a.d * b.d);
}

export function sub(a: Rational, b: Rational): Rational {
  return reduce(a.n * b.d - b.n * a.d, a.d * b.d);
}

export function mul(a: Rational, b: Rational): Rational {
  return reduce(a.n * b.n, a.d * b.d);
}

export function div(a: Rational, b: Rational): Rational {
  if (b.n === 0n) throw new RangeError('division by zero');
  return reduce(a.n * b.d, a.d * b.n);
}

/** (a + b) / 2 */
export function midpoint(a: Rational, b: Rational): Rational {
  return reduce(a.n * b.d + b.n * a.d, 2n * a.d * b.d);
}

// -- comparison -------------------------------------------------------------

/** Sign of a - b: -1, 0 or 1. */
export function compare(a: Rational, b: Rational): -1 | 0 | 1 {
  // Denominators are positive, so cross-multiplying keeps the order.
  const l = a.n * b.d;
  const r = b.n * a.d;
  return l < r ? -1 : l > r ? 1 : 0;
}

export function lt(a: Rational, b: Rational): boolean {
  return compare(a, b) < 0;
}

export function lte(a: Rational, b: Rational): boolean {
  return compare(a, b) <= 0;
}

export function gt(a: Rational, b: Rational): boolean {
  return compare(a, b) > 0;
}

export function gte(a: Rational, b: Rational): boolean {
  return compare(a, b) >= 0;
}

export function eq(a: Rational, b: Rational): boolean {
  return a.n === b.n && a.d === b.d;
}

// -- conversion -------------------------------------------------------------

/** Number of bits needed to represent |n| (0 → 0). */
export function bitLength(n: bigint): number {
  const abs = bigAbs(n);
  return abs === 0n ? 0 : abs.toString(2).length;
}

/**
 * Nearest float64. Large terms are shifted down to ~53 significant bits
 * first so that Number() never overflows to Infinity.
 */
export function toNumber(r: Rational): number {
  if (r.n === 0n) return 0;
  const nShift = Math.max(0, bitLength(r.n) - 53);
  const dShift = Math.max(0, bitLength(r.d) - 53);
  const sn = r.n >> BigInt(nShift);
  const sd = r.d >> BigInt(dShift);
  return (Number(sn) / Number(sd)) * 2 ** (nShift - dShift);
}

export function format(r: Rational): string {
  return r.d === 1n ? r.n.toString() : `${r.n}/${r.d}`;
}
