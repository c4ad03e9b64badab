import { describe, it, expect } from 'vitest';
import { ConfigurationError, ReferenceDataError } from '@kpcdst/core';
import { createReferenceData, DEFAULT_REFERENCE_DATA } from '../reference-data/reference-data.js';
import {
  ageEffect,
  findTreatmentByName,
  normativeReference,
  treatmentOption,
} from '../reference-data/lookups.js';

describe('DEFAULT_REFERENCE_DATA', () => {
  it('should be deeply frozen', () => {
    expect(Object.isFrozen(DEFAULT_REFERENCE_DATA)).toBe(true);
    expect(Object.isFrozen(DEFAULT_REFERENCE_DATA.normative.regional.serum.TRP)).toBe(true);
    expect(Object.isFrozen(DEFAULT_REFERENCE_DATA.economics.productivityLossBreakdown)).toBe(true);
  });

  it('should split the productivity loss between employee and employer', () => {
    const sides = DEFAULT_REFERENCE_DATA.economics.productivityLossBreakdown.map((b) => b.side);
    expect(sides).toEqual(['EMPLOYEE', 'EMPLOYER', 'EMPLOYEE', 'EMPLOYER', 'EMPLOYER']);
  });
});

describe('createReferenceData', () => {
  it('should replace whole sections', () => {
    const reference = createReferenceData({
      model: { ...DEFAULT_REFERENCE_DATA.model, compositeDivisor: 2 },
    });
    expect(reference.model.compositeDivisor).toBe(2);
    expect(reference.treatments).toEqual(DEFAULT_REFERENCE_DATA.treatments);
  });

  it('should reject a negative standard deviation', () => {
    expect(() =>
      createReferenceData({
        normative: {
          ...DEFAULT_REFERENCE_DATA.normative,
          global: {
            ...DEFAULT_REFERENCE_DATA.normative.global,
            plasma: {
              ...DEFAULT_REFERENCE_DATA.normative.global.plasma,
              KYN: { mean: 1.82, standardDeviation: -0.1, unit: 'μM' },
            },
          },
        },
      })
    ).toThrow(ConfigurationError);
  });

  it('should report the failing path', () => {
    try {
      createReferenceData({
        model: { ...DEFAULT_REFERENCE_DATA.model, thresholds: { high: 0, moderate: 0.5, lowModerate: -0.5 } },
      });
      expect.unreachable('createReferenceData should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.issues).toEqual([
          'model.thresholds: Thresholds must be strictly descending (high > moderate > lowModerate)',
        ]);
      }
    }
  });

  it('should reject efficacy above 1', () => {
    expect(() =>
      createReferenceData({
        economics: { ...DEFAULT_REFERENCE_DATA.economics, kpTargetedItbsEfficacy: 1.2 },
      })
    ).toThrow(ConfigurationError);
  });
});

describe('lookups', () => {
  it('should return normative references and age effects', () => {
    expect(normativeReference(DEFAULT_REFERENCE_DATA, 'global', 'plasma', 'TRP')).toEqual({
      mean: 51.45,
      standardDeviation: 10.47,
      unit: 'μM',
    });
    expect(ageEffect(DEFAULT_REFERENCE_DATA, 'plasma', 'TRP').beta).toBe(-0.74);
  });

  it('should return treatment options', () => {
    expect(treatmentOption(DEFAULT_REFERENCE_DATA, 'ITBS')).toMatchObject({
      annualCost: 7500,
      rebate: 4080,
      outOfPocket: 3420,
      moodEvidence: 'B',
      cognitionEvidence: 'GAP',
    });
  });

  it('should resolve a treatment by display name', () => {
    expect(findTreatmentByName(DEFAULT_REFERENCE_DATA, 'MHT (HRT)')).toBe('MHT');
    expect(findTreatmentByName(DEFAULT_REFERENCE_DATA, 'Monitoring Only')).toBe('MONITORING');
  });

  it('should reject an unknown treatment name', () => {
    expect(() => findTreatmentByName(DEFAULT_REFERENCE_DATA, 'Acupuncture')).toThrow(
      'Unknown treatment entry: "Acupuncture"'
    );
    expect(() => findTreatmentByName(DEFAULT_REFERENCE_DATA, 'mht (hrt)')).toThrow(ReferenceDataError);
  });
});
