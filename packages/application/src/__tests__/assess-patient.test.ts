import { describe, it, expect, vi } from 'vitest';
import { ValidationError, createLogger, validateEnv } from '@kpcdst/core';
import {
  AssessPatientUseCase,
  createAssessPatientUseCase,
  parsePatientProfile,
  parseScalingOptions,
} from '../use-cases/assess-patient/AssessPatientUseCase.js';

/**
 * Tests for AssessPatientUseCase
 *
 * Covers:
 * - Boundary validation of the profile and the scaling options
 * - Full pipeline wiring
 * - Environment and option defaults
 * - Determinism
 * - Logging of out-of-range ages
 */

const profileWithBiomarkers = {
  age: 51,
  menopausalStage: 'LATE_PERIMENOPAUSE',
  symptoms: ['COGNITIVE_FOG', 'SLEEP_DISTURBANCE', 'VASOMOTOR'],
  riskFactors: ['NO_CURRENT_MHT'],
  biomarkers: { sampleType: 'serum', trp: 52.4, kyn: 2.95 },
  population: 'regional',
};

function createUseCase(env = validateEnv({})): AssessPatientUseCase {
  return createAssessPatientUseCase({
    env,
    logger: createLogger({ name: 'assess-patient-test', level: 'silent' }),
  });
}

describe('AssessPatientUseCase', () => {
  describe('execute', () => {
    it('should run the full pipeline for a patient with biomarkers', () => {
      const assessment = createUseCase().execute(profileWithBiomarkers);

      expect(assessment.kpRisk?.level).toBe('MODERATE');
      expect(assessment.ranking.map((r) => [r.treatment, r.score])).toEqual([
        ['MHT', 100],
        ['ITBS', 75],
        ['CBT', 55],
        ['MONITORING', 50],
        ['SSRI_SNRI', 40],
      ]);
      expect(assessment.costOffsets).toHaveLength(5);
      expect(assessment.costOffsets[0]).toMatchObject({ treatment: 'ITBS', offset: 5702 });
      expect(assessment.nationalScaling).toMatchObject({
        treatment: 'MHT',
        treated: 7200,
        nationalOffset: 27_993_600,
      });
      expect(assessment.dementiaRisk.classicalScore).toBe(3);
      expect(assessment.dementiaRisk.combinedLevel).toBe('MODERATE');
      expect(assessment.dementiaCostAvoidance.subgroupAttributableFraction).toBe(0.05);
      expect(assessment.dementiaCostAvoidance.perPatientValue).toBe(22_100);
      expect(assessment.summary[0]).toBe('Patient: 51yo female, Late perimenopause');
      expect(assessment.summary).toContain('Recommended Treatment: MHT (HRT) (score 100/100)');
    });

    it('should skip KP classification without biomarkers', () => {
      const assessment = createUseCase().execute({
        age: 48,
        menopausalStage: 'EARLY_PERIMENOPAUSE',
        symptoms: ['DEPRESSION'],
      });

      expect(assessment.kpRisk).toBeUndefined();
      expect(assessment.ranking[0]).toEqual({ treatment: 'SSRI_SNRI', name: 'SSRI/SNRI', score: 65 });
      expect(assessment.costOffsets[0]?.offset).toBe(3110);
      expect(assessment.summary[3]).toBe(
        'KP Biomarkers: Not available; recommend serum TRP/KYN ($80 AUD)'
      );
    });

    it('should value neurovascular findings in the dementia cost avoidance', () => {
      const assessment = createUseCase().execute({
        age: 55,
        menopausalStage: 'EARLY_POSTMENOPAUSE',
        neuroimaging: { microbleedCount: 0, hasWhiteMatterChanges: true, hasSiderosis: true },
      });

      expect(assessment.dementiaRisk.neurovascularScore).toBe(5);
      expect(assessment.dementiaRisk.neurovascularLevel).toBe('HIGH');
      expect(assessment.dementiaCostAvoidance.perPatientValue).toBe(88_400);
      expect(assessment.dementiaCostAvoidance.costEffectiveness).toBe('STRONGLY_COST_EFFECTIVE');
    });

    it('should be deterministic', () => {
      const useCase = createUseCase();
      expect(useCase.execute(profileWithBiomarkers)).toEqual(useCase.execute(profileWithBiomarkers));
    });

    it('should return a frozen assessment', () => {
      const assessment = createUseCase().execute(profileWithBiomarkers);
      expect(Object.isFrozen(assessment)).toBe(true);
      expect(Object.isFrozen(assessment.kpRisk)).toBe(true);
    });

    it('should apply uptake and population options', () => {
      const assessment = createUseCase().execute(profileWithBiomarkers, {
        uptakeFraction: 0.1,
        eligiblePopulation: 1000,
        correlationId: 'corr-123',
      });

      expect(assessment.nationalScaling.treated).toBe(100);
      expect(assessment.nationalScaling.nationalCost).toBe(38_000);
    });

    it('should reject an uptake given as a percentage', () => {
      const useCase = createUseCase();

      expect(() => useCase.execute(profileWithBiomarkers, { uptakeFraction: 2 })).toThrow(
        ValidationError
      );
      expect(() => useCase.execute(profileWithBiomarkers, { uptakeFraction: 2 })).toThrow(
        /^Invalid assessment options: uptakeFraction: /
      );
    });

    it('should warn when the options are rejected', () => {
      const logger = createLogger({ name: 'assess-patient-test', level: 'silent' });
      const warn = vi.spyOn(logger, 'warn');
      const useCase = new AssessPatientUseCase({ env: validateEnv({}), logger });

      expect(() => useCase.execute(profileWithBiomarkers, { eligiblePopulation: -5 })).toThrow(
        ValidationError
      );
      expect(warn).toHaveBeenCalledTimes(1);
    });

    it('should take national scaling defaults from the environment', () => {
      const useCase = createUseCase(
        validateEnv({ KPCDST_ELIGIBLE_POPULATION: '50000', KPCDST_UPTAKE_PERCENT: '10' })
      );
      const assessment = useCase.execute(profileWithBiomarkers);

      expect(assessment.nationalScaling.eligiblePopulation).toBe(50_000);
      expect(assessment.nationalScaling.uptakeFraction).toBe(0.1);
      expect(assessment.nationalScaling.treated).toBe(5000);
    });

    it('should default the population from the environment', () => {
      const useCase = createUseCase(validateEnv({ KPCDST_POPULATION: 'global' }));
      const { population: _ignored, ...withoutPopulation } = profileWithBiomarkers;

      expect(useCase.execute(withoutPopulation).profile.population).toBe('global');
      expect(useCase.execute(profileWithBiomarkers).profile.population).toBe('regional');
    });

    it('should reject an unknown symptom with a ValidationError', () => {
      const useCase = createUseCase();
      const raw = { ...profileWithBiomarkers, symptoms: ['HEADACHE'] };

      expect(() => useCase.execute(raw)).toThrow(ValidationError);
      expect(() => useCase.execute(raw)).toThrow(/symptoms\.0/);
    });

    it('should warn when age is outside the validated range', () => {
      const logger = createLogger({ name: 'assess-patient-test', level: 'silent' });
      const warn = vi.spyOn(logger, 'warn');
      const useCase = new AssessPatientUseCase({ env: validateEnv({}), logger });

      useCase.execute({ ...profileWithBiomarkers, age: 70 });

      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn).toHaveBeenCalledWith(
        { age: 70, validatedRange: { min: 40, max: 65 } },
        'Age outside the validated range; results are extrapolated'
      );
    });

    it('should not warn inside the validated range', () => {
      const logger = createLogger({ name: 'assess-patient-test', level: 'silent' });
      const warn = vi.spyOn(logger, 'warn');
      new AssessPatientUseCase({ env: validateEnv({}), logger }).execute(profileWithBiomarkers);

      expect(warn).not.toHaveBeenCalled();
    });
  });
});

describe('parsePatientProfile', () => {
  it('should apply defaults and drop duplicate symptoms', () => {
    expect(
      parsePatientProfile({
        age: 50,
        menopausalStage: 'LATE_PERIMENOPAUSE',
        symptoms: ['FATIGUE', 'FATIGUE', 'ANXIETY'],
      })
    ).toEqual({
      age: 50,
      menopausalStage: 'LATE_PERIMENOPAUSE',
      symptoms: ['FATIGUE', 'ANXIETY'],
      riskFactors: [],
      apoeStatus: 'UNKNOWN',
      population: 'regional',
    });
  });

  it('should list every offending path', () => {
    try {
      parsePatientProfile({ age: -1, menopausalStage: 'PREMENOPAUSE' });
      expect.unreachable('parsePatientProfile should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.message).toMatch(/^Invalid patient profile: age: .*; menopausalStage: /);
      }
    }
  });

  it('should reject a non-object profile', () => {
    expect(() => parsePatientProfile('not a profile')).toThrow(/\(root\)/);
  });

  it('should reject negative biomarker values', () => {
    expect(() =>
      parsePatientProfile({
        age: 50,
        menopausalStage: 'LATE_PERIMENOPAUSE',
        biomarkers: { sampleType: 'serum', trp: -1, kyn: 2 },
      })
    ).toThrow(/biomarkers\.trp/);
  });
});

describe('parseScalingOptions', () => {
  it('should pass valid overrides through', () => {
    expect(parseScalingOptions({ uptakeFraction: 0.05, eligiblePopulation: 1000 })).toEqual({
      uptakeFraction: 0.05,
      eligiblePopulation: 1000,
    });
  });

  it('should accept no overrides', () => {
    expect(parseScalingOptions({ correlationId: 'corr-1' })).toEqual({});
  });

  it('should reject uptake outside 0-1', () => {
    expect(() => parseScalingOptions({ uptakeFraction: -0.1 })).toThrow(/uptakeFraction/);
    expect(() => parseScalingOptions({ uptakeFraction: 1.5 })).toThrow(/uptakeFraction/);
  });

  it('should reject a fractional eligible population', () => {
    expect(() => parseScalingOptions({ eligiblePopulation: 10.5 })).toThrow(
      /^Invalid assessment options: eligiblePopulation: /
    );
  });
});
