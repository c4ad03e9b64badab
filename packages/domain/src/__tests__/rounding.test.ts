import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { roundHalfEven } from '../shared/rounding.js';

describe('roundHalfEven', () => {
  it('should round ties to the even neighbour', () => {
    expect(roundHalfEven(0.5)).toBe(0);
    expect(roundHalfEven(1.5)).toBe(2);
    expect(roundHalfEven(2.5)).toBe(2);
    expect(roundHalfEven(12958.5)).toBe(12958);
    expect(roundHalfEven(-2.5)).toBe(-2);
    expect(roundHalfEven(-3.5)).toBe(-4);
  });

  it('should round non-ties to the nearest integer', () => {
    expect(roundHalfEven(3110.04)).toBe(3110);
    expect(roundHalfEven(2.51)).toBe(3);
    expect(roundHalfEven(-1.2)).toBe(-1);
  });

  it('should pass non-finite values through', () => {
    expect(roundHalfEven(Number.POSITIVE_INFINITY)).toBe(Number.POSITIVE_INFINITY);
    expect(roundHalfEven(Number.NaN)).toBeNaN();
  });

  it('should stay within one half of the input', () => {
    fc.assert(
      fc.property(fc.double({ min: -1e9, max: 1e9, noNaN: true }), (value) => {
        const rounded = roundHalfEven(value);
        expect(Number.isInteger(rounded)).toBe(true);
        expect(Math.abs(rounded - value)).toBeLessThanOrEqual(0.5);
      })
    );
  });
});
