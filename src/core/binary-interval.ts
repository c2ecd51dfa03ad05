import { IntervalError } from '../errors.js';
import { bitLength, format, lt, sub, ZERO, ONE, type Rational } from './rational.js';

/**
 * Binary code: a string of '0' and '1' read as the fraction 0.bits.
 */
export type BinaryCode = string;

/**
 * Dyadic interval [n/d, m/d) of a binary code, with m = n + 1 and d = 2^L.
 */
export interface DyadicInterval {
  n: bigint;
  m: bigint;
  d: bigint;
}

const BINARY_PATTERN = /^[01]*$/;

export function assertBinaryCode(code: string): void {
  if (!BINARY_PATTERN.test(code)) {
    throw new IntervalError(`Invalid binary code: ${JSON.stringify(code)}`);
  }
}

/**
 * Require 0 <= u < v <= 1.
 */
export function assertInterval(u: Rational, v: Rational): void {
  if (lt(u, ZERO) || lt(ONE, v) || !lt(u, v)) {
    throw new IntervalError(
      `Invalid interval [${format(u)}, ${format(v)}): expected 0 <= u < v <= 1`
    );
  }
}

/**
 * Numerator and denominator of the dyadic interval for a binary code.
 * The empty code covers [0, 1).
 */
export function binaryInterval(code: BinaryCode): DyadicInterval {
  assertBinaryCode(code);
  const n = code.length === 0 ? 0n : BigInt(`0b${code}`);
  return { n, m: n + 1n, d: 1n << BigInt(code.length) };
}

// n/d <= u and v <= (n+1)/d
function surrounds(n: bigint, d: bigint, u: Rational, v: Rational): boolean {
  return n * u.d <= u.n * d && v.n * d <= (n + 1n) * v.d;
}

// u <= n/d and (n+1)/d <= v
function within(n: bigint, d: bigint, u: Rational, v: Rational): boolean {
  return u.n * d <= n * u.d && (n + 1n) * v.d <= v.n * d;
}

/**
 * Whether the dyadic interval of `code` contains [u, v).
 */
export function around(code: BinaryCode, u: Rational, v: Rational): boolean {
  const { n, d } = binaryInterval(code);
  return surrounds(n, d, u, v);
}

/**
 * Whether the dyadic interval of `code` is contained by [u, v).
 */
export function inside(code: BinaryCode, u: Rational, v: Rational): boolean {
  const { n, d } = binaryInterval(code);
  return within(n, d, u, v);
}

/**
 * Find the longest extension of `code` whose interval still surrounds
 * [u, v). Appending '0' is always tried before '1'; existing bits are
 * never removed.
 */
export function extendAround(
  code: BinaryCode,
  u: Rational,
  v: Rational
): BinaryCode {
  assertInterval(u, v);
  let { n, d } = binaryInterval(code);
  const appended: string[] = [];

  // Each bit halves the dyadic width, which cannot drop below v - u.
  while (true) {
    const n0 = n << 1n;
    const d0 = d << 1n;
    if (surrounds(n0, d0, u, v)) {
      n = n0;
      appended.push('0');
    } else if (surrounds(n0 + 1n, d0, u, v)) {
      n = n0 + 1n;
      appended.push('1');
    } else {
      break;
    }
    d = d0;
  }

  return code + appended.join('');
}

/**
 * Upper bound on the bits `extendInside` may append before giving up.
 * A starting interval that overlaps the target converges well within it.
 */
export function insideStepLimit(u: Rational, v: Rational): number {
  const width = sub(v, u);
  return 2 * (bitLength(width.d) - bitLength(width.n) + 2) + 8;
}

/**
 * Find the shortest extension of `code` whose interval sits inside [u, v).
 *
 * Each step halves the dyadic interval towards whichever end of [u, v)
 * it overshoots more: '1' when the gap below (u·d − n) is strictly larger
 * than the gap above (m − v·d), '0' otherwise.
 */
export function extendInside(
  code: BinaryCode,
  u: Rational,
  v: Rational
): BinaryCode {
  assertInterval(u, v);
  let { n, d } = binaryInterval(code);
  const appended: string[] = [];
  const limit = insideStepLimit(u, v);

  while (!within(n, d, u, v)) {
    if (appended.length >= limit) {
      throw new IntervalError(
        `Code ${JSON.stringify(code)} cannot be extended inside ` +
          `[${format(u)}, ${format(v)}) within ${limit} bits`
      );
    }

    // Compare u·d − n against m − v·d over the common denominator u.d·v.d.
    const below = (u.n * d - n * u.d) * v.d;
    const above = ((n + 1n) * v.d - v.n * d) * u.d;

    n <<= 1n;
    d <<= 1n;
    if (below > above) {
      n += 1n;
      appended.push('1');
    } else {
      appended.push('0');
    }
  }

  return code + appended.join('');
}

/**
 * Lower end of the dyadic interval as a rational, 0.bits.
 */
export function codeValue(code: BinaryCode): Rational {
  const { n, d } = binaryInterval(code);
  if (n === 0n) return ZERO;
  // d is a power of two; strip common factors of two.
  let num = n;
  let den = d;
  while ((num & 1n) === 0n) {
    num >>= 1n;
    den >>= 1n;
  }
  return { n: num, d: den };
}
