import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  REFERENCE_AGE,
  ageAdjust,
  deviationStatus,
  expectedTrajectory,
  zScore,
} from '../kp-risk/biomarker-normalizer.js';
import { DEFAULT_REFERENCE_DATA } from '../reference-data/reference-data.js';

describe('ageAdjust', () => {
  it('should return the base mean at the reference age for any slope', () => {
    fc.assert(
      fc.property(
        fc.double({ min: 0.01, max: 500, noNaN: true }),
        fc.double({ min: -5, max: 5, noNaN: true }),
        (mean, beta) => {
          expect(ageAdjust(REFERENCE_AGE, mean, beta)).toBe(mean);
        }
      )
    );
  });

  it('should apply the slope per year from the reference age', () => {
    expect(ageAdjust(57.35, 42.87, -0.74)).toBeCloseTo(35.47, 10);
    expect(ageAdjust(37.35, 2.43, 0.01)).toBeCloseTo(2.33, 10);
  });

  it('should honour a custom reference age', () => {
    expect(ageAdjust(50, 10, 1, 40)).toBe(20);
  });
});

describe('zScore', () => {
  it('should standardise the deviation', () => {
    expect(zScore(12, 10, 2)).toBe(1);
    expect(zScore(7, 10, 2)).toBe(-1.5);
  });

  it('should return 0 for a zero standard deviation', () => {
    expect(zScore(50, 10, 0)).toBe(0);
  });
});

describe('deviationStatus', () => {
  it('should bucket at one standard deviation', () => {
    expect(deviationStatus(-1.01)).toBe('LOW');
    expect(deviationStatus(-1)).toBe('NORMAL');
    expect(deviationStatus(0)).toBe('NORMAL');
    expect(deviationStatus(1)).toBe('NORMAL');
    expect(deviationStatus(1.01)).toBe('HIGH');
  });
});

describe('expectedTrajectory', () => {
  it('should cover every whole year from 40 to 65 by default', () => {
    const points = expectedTrajectory(DEFAULT_REFERENCE_DATA, 'regional', 'serum', 'TRP');

    expect(points).toHaveLength(26);
    expect(points[0]?.age).toBe(40);
    expect(points[25]?.age).toBe(65);
  });

  it('should decline for TRP and rise for KYN', () => {
    const trp = expectedTrajectory(DEFAULT_REFERENCE_DATA, 'regional', 'plasma', 'TRP', 45, 46);
    const kyn = expectedTrajectory(DEFAULT_REFERENCE_DATA, 'regional', 'plasma', 'KYN', 45, 46);

    expect(trp.map((p) => p.age)).toEqual([45, 46]);
    expect((trp[1]?.expectedMean ?? 0) - (trp[0]?.expectedMean ?? 0)).toBeCloseTo(-0.74, 10);
    expect((kyn[1]?.expectedMean ?? 0) - (kyn[0]?.expectedMean ?? 0)).toBeCloseTo(0.02, 10);
  });
});
