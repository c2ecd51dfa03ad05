import { describe, it, expect } from 'vitest';
import {
  binaryInterval,
  around,
  inside,
  extendAround,
  extendInside,
  insideStepLimit,
  codeValue,
} from '../src/core/binary-interval.js';
import { rational, ZERO, ONE } from '../src/core/rational.js';
import { IntervalError } from '../src/errors.js';

describe('binaryInterval', () => {
  it('should map the empty code to [0, 1)', () => {
    expect(binaryInterval('')).toEqual({ n: 0n, m: 1n, d: 1n });
  });

  it('should read bits most significant first', () => {
    expect(binaryInterval('101')).toEqual({ n: 5n, m: 6n, d: 8n });
    expect(binaryInterval('0001')).toEqual({ n: 1n, m: 2n, d: 16n });
  });

  it('should reject characters other than 0 and 1', () => {
    expect(() => binaryInterval('012')).toThrow(IntervalError);
    expect(() => binaryInterval('1 0')).toThrow(IntervalError);
  });

  it('should give the lower end as a reduced rational', () => {
    expect(codeValue('')).toEqual(ZERO);
    expect(codeValue('0100')).toEqual(rational(1, 4));
    expect(codeValue('00011110011110010')).toEqual(rational(7801, 65536));
  });
});

describe('around / inside', () => {
  it('should test whether the code surrounds an interval', () => {
    expect(around('00', rational(1, 10), rational(2, 15))).toBe(true);
    expect(around('000', rational(1, 10), rational(2, 15))).toBe(false);
    expect(around('', ZERO, ONE)).toBe(true);
  });

  it('should accept shared endpoints for both tests', () => {
    // [1/4, 1/2) is exactly the interval of '01'
    expect(around('01', rational(1, 4), rational(1, 2))).toBe(true);
    expect(inside('01', rational(1, 4), rational(1, 2))).toBe(true);
  });

  it('should test whether the code sits inside an interval', () => {
    expect(inside('0111', rational(5, 12), rational(1, 2))).toBe(true);
    expect(inside('011', rational(5, 12), rational(1, 2))).toBe(false);
    expect(inside('', rational(1, 2), ONE)).toBe(false);
  });
});

describe('extendAround', () => {
  it('should find the longest surrounding extension', () => {
    expect(extendAround('', rational(1, 3), rational(1, 2))).toBe('01');
    expect(extendAround('', ZERO, rational(1, 3))).toBe('0');
    expect(extendAround('', rational(1, 10), rational(2, 15))).toBe('00');
    expect(extendAround('0', rational(1, 4), rational(3, 8))).toBe('010');
  });

  it('should leave the code alone when no bit can be added', () => {
    expect(extendAround('', ZERO, ONE)).toBe('');
    expect(extendAround('00', rational(1, 10), rational(2, 15))).toBe('00');
  });

  it('should never remove existing bits', () => {
    const code = extendAround('000111', rational(449, 3780), rational(5, 42));
    expect(code.startsWith('000111')).toBe(true);
    expect(code).toBe('00011110011');
  });

  it('should reject invalid intervals', () => {
    expect(() => extendAround('', rational(1, 2), rational(1, 2))).toThrow(
      IntervalError
    );
    expect(() => extendAround('', rational(-1, 2), ONE)).toThrow(IntervalError);
    expect(() => extendAround('', ZERO, rational(3, 2))).toThrow(IntervalError);
  });
});

describe('extendInside', () => {
  it('should find the shortest extension that fits inside', () => {
    expect(extendInside('', rational(1, 3), rational(1, 2))).toBe('011');
    expect(extendInside('', rational(1, 2), ONE)).toBe('1');
    expect(extendInside('0', rational(1, 5), rational(3, 10))).toBe('00111');
    expect(extendInside('', rational(2, 3), rational(3, 4))).toBe('1011');
  });

  it('should return the code unchanged when it already fits', () => {
    expect(extendInside('0111', rational(5, 12), rational(1, 2))).toBe('0111');
  });

  it('should give up on a target outside the code interval', () => {
    // [1/2, 1) can never shrink into [0, 1/4)
    expect(insideStepLimit(ZERO, rational(1, 4))).toBe(16);
    expect(() => extendInside('1', ZERO, rational(1, 4))).toThrow(
      IntervalError
    );
  });
});
