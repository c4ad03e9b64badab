import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { ApoeStatusSchema, RiskFactorSchema, SymptomSchema } from '@kpcdst/types';
import {
  DementiaRiskScorer,
  createDementiaRiskScorer,
  type DementiaRiskInput,
} from '../dementia/dementia-risk-scorer.js';
import {
  CLASSICAL_MAX_SCORE,
  DEFAULT_DEMENTIA_RULES,
  NEUROVASCULAR_MAX_SCORE,
} from '../dementia/dementia-rules.js';

const emptyInput: DementiaRiskInput = {
  riskFactors: [],
  symptoms: [],
  apoeStatus: 'UNKNOWN',
};

describe('DementiaRiskScorer', () => {
  const scorer = new DementiaRiskScorer();

  describe('score', () => {
    it('should score a patient with nothing reported at population level', () => {
      expect(scorer.score(emptyInput)).toEqual({
        classicalScore: 0,
        neurovascularScore: 0,
        combinedScore: 0,
        neurovascularLevel: 'LOW',
        combinedLevel: 'POPULATION_LEVEL',
        contributingFactors: [],
      });
    });

    it('should reach the maximum of 23 with every factor present', () => {
      const result = scorer.score({
        riskFactors: [
          'NO_CURRENT_MHT',
          'FAMILY_HISTORY_DEMENTIA',
          'EARLY_MENOPAUSE',
          'BILATERAL_OOPHORECTOMY',
          'HISTORY_OF_DEPRESSION',
        ],
        symptoms: ['MEMORY_PROBLEMS', 'COGNITIVE_FOG'],
        kpRisk: { level: 'HIGH' },
        neuroimaging: { microbleedCount: 7, hasWhiteMatterChanges: true, hasSiderosis: true },
        apoeStatus: 'HOMOZYGOUS_E4_E4',
      });

      expect(result.classicalScore).toBe(12);
      expect(result.neurovascularScore).toBe(11);
      expect(result.combinedScore).toBe(CLASSICAL_MAX_SCORE + NEUROVASCULAR_MAX_SCORE);
      expect(result.neurovascularLevel).toBe('HIGH');
      expect(result.combinedLevel).toBe('CRITICAL');
      expect(result.contributingFactors.map((f) => [f.factor, f.points, f.track])).toEqual([
        ['Bilateral oophorectomy <menopause', 3, 'CLASSICAL'],
        ['Early menopause (<45)', 3, 'CLASSICAL'],
        ['Family history', 2, 'CLASSICAL'],
        ['No MHT during critical window', 1, 'CLASSICAL'],
        ['KP dysregulation (HIGH)', 2, 'CLASSICAL'],
        ['Current cognitive symptoms', 1, 'CLASSICAL'],
        ['Cerebral microbleeds (>=5)', 3, 'NEUROVASCULAR'],
        ['WMH (Fazekas 2-3)', 2, 'NEUROVASCULAR'],
        ['Superficial siderosis', 3, 'NEUROVASCULAR'],
        ['APOE e4/e4 homozygous', 3, 'NEUROVASCULAR'],
      ]);
    });

    it('should not score a history of depression', () => {
      expect(
        scorer.score({ ...emptyInput, riskFactors: ['HISTORY_OF_DEPRESSION'] }).combinedScore
      ).toBe(0);
    });

    it('should add one point for MODERATE KP and none for LOW_MODERATE', () => {
      expect(scorer.score({ ...emptyInput, kpRisk: { level: 'MODERATE' } }).classicalScore).toBe(1);
      expect(scorer.score({ ...emptyInput, kpRisk: { level: 'LOW_MODERATE' } }).classicalScore).toBe(
        0
      );
    });

    it('should score 1-4 microbleeds at two points with the count in the effect size', () => {
      const result = scorer.score({
        ...emptyInput,
        neuroimaging: { microbleedCount: 3, hasWhiteMatterChanges: false, hasSiderosis: false },
      });

      expect(result.neurovascularScore).toBe(2);
      expect(result.neurovascularLevel).toBe('MODERATE');
      expect(result.contributingFactors).toEqual([
        {
          factor: 'Cerebral microbleeds (1-4)',
          effectSize: '3 CMBs on MRI',
          source: 'ARIA-H literature',
          points: 2,
          track: 'NEUROVASCULAR',
        },
      ]);
    });

    it('should score zero microbleeds as nothing', () => {
      const result = scorer.score({
        ...emptyInput,
        neuroimaging: { microbleedCount: 0, hasWhiteMatterChanges: false, hasSiderosis: false },
      });
      expect(result.neurovascularScore).toBe(0);
    });

    it('should score heterozygous APOE e4 at two points', () => {
      const result = scorer.score({ ...emptyInput, apoeStatus: 'HETEROZYGOUS_E3_E4' });
      expect(result.neurovascularScore).toBe(2);
      expect(result.combinedLevel).toBe('POPULATION_LEVEL');
    });

    it('should return a frozen result', () => {
      expect(Object.isFrozen(createDementiaRiskScorer().score(emptyInput))).toBe(true);
    });
  });

  describe('levels', () => {
    it('should grade the neurovascular track at 2 and 5', () => {
      expect(scorer.neurovascularLevel(1)).toBe('LOW');
      expect(scorer.neurovascularLevel(2)).toBe('MODERATE');
      expect(scorer.neurovascularLevel(4)).toBe('MODERATE');
      expect(scorer.neurovascularLevel(5)).toBe('HIGH');
    });

    it('should grade the combined score at 3, 6 and 10', () => {
      expect(scorer.combinedLevel(2)).toBe('POPULATION_LEVEL');
      expect(scorer.combinedLevel(3)).toBe('MODERATE');
      expect(scorer.combinedLevel(5)).toBe('MODERATE');
      expect(scorer.combinedLevel(6)).toBe('ELEVATED');
      expect(scorer.combinedLevel(9)).toBe('ELEVATED');
      expect(scorer.combinedLevel(10)).toBe('CRITICAL');
    });
  });

  describe('properties', () => {
    it('should keep each track within its maximum and sum them', () => {
      fc.assert(
        fc.property(
          fc.subarray([...RiskFactorSchema.options]),
          fc.subarray([...SymptomSchema.options]),
          fc.option(fc.constantFrom('LOW' as const, 'LOW_MODERATE' as const, 'MODERATE' as const, 'HIGH' as const), {
            nil: undefined,
          }),
          fc.option(
            fc.record({
              microbleedCount: fc.nat({ max: 50 }),
              hasWhiteMatterChanges: fc.boolean(),
              hasSiderosis: fc.boolean(),
            }),
            { nil: undefined }
          ),
          fc.constantFrom(...ApoeStatusSchema.options),
          (riskFactors, symptoms, level, neuroimaging, apoeStatus) => {
            const result = scorer.score({
              riskFactors,
              symptoms,
              kpRisk: level === undefined ? undefined : { level },
              neuroimaging,
              apoeStatus,
            });

            expect(result.classicalScore).toBeLessThanOrEqual(CLASSICAL_MAX_SCORE);
            expect(result.neurovascularScore).toBeLessThanOrEqual(NEUROVASCULAR_MAX_SCORE);
            expect(result.combinedScore).toBe(result.classicalScore + result.neurovascularScore);
            expect(result.contributingFactors.reduce((sum, f) => sum + f.points, 0)).toBe(
              result.combinedScore
            );
          }
        )
      );
    });
  });
});

describe('DEFAULT_DEMENTIA_RULES', () => {
  it('should be frozen down to the individual rules', () => {
    expect(Object.isFrozen(DEFAULT_DEMENTIA_RULES)).toBe(true);
    expect(Object.isFrozen(DEFAULT_DEMENTIA_RULES.riskFactorOrder)).toBe(true);
    expect(Object.isFrozen(DEFAULT_DEMENTIA_RULES.riskFactors.BILATERAL_OOPHORECTOMY)).toBe(true);
    expect(Object.isFrozen(DEFAULT_DEMENTIA_RULES.combinedLevels)).toBe(true);
  });
});
