/**
 * @fileoverview Reference Data
 *
 * Population norms, regression coefficients and economic constants for the
 * KP decision-support engine. Built once, validated, then deep-frozen and
 * passed explicitly to every component that needs it.
 *
 * Sources:
 * - Normative TRP/KYN means, age and sex regressions: Metri et al. (2023),
 *   Int J Tryptophan Res, N=8,089 across 120 studies
 * - Productivity loss: Stromberg et al. (2017) decomposition
 * - Dementia lifetime cost: NATSEM estimate
 *
 * @module domain/reference-data
 */

import { ReferenceDataSchema, type ReferenceData } from '@kpcdst/types';
import { ConfigurationError } from '@kpcdst/core';

import { deepFreeze } from '../shared/freeze.js';

const UNIT = 'μM';

const DEFAULT_TABLES: ReferenceData = {
  normative: {
    global: {
      serum: {
        TRP: { mean: 60.52, standardDeviation: 15.38, unit: UNIT },
        KYN: { mean: 1.96, standardDeviation: 0.51, unit: UNIT },
      },
      plasma: {
        TRP: { mean: 51.45, standardDeviation: 10.47, unit: UNIT },
        KYN: { mean: 1.82, standardDeviation: 0.54, unit: UNIT },
      },
    },
    // Australian subset
    regional: {
      serum: {
        TRP: { mean: 67.26, standardDeviation: 11.19, unit: UNIT },
        KYN: { mean: 2.43, standardDeviation: 0.59, unit: UNIT },
      },
      plasma: {
        TRP: { mean: 42.87, standardDeviation: 8.51, unit: UNIT },
        KYN: { mean: 2.12, standardDeviation: 0.52, unit: UNIT },
      },
    },
  },
  ageEffects: {
    serum: {
      TRP: { beta: -0.2, p: 0.036 },
      KYN: { beta: 0.01, p: 0.002 },
    },
    plasma: {
      TRP: { beta: -0.74, p: 0.001 },
      KYN: { beta: 0.02, p: 0.001 },
    },
  },
  // Female vs male; informational only, not applied to the norms
  sexEffects: {
    serum: {
      TRP: { beta: -0.22, p: 0.012 },
      KYN: { beta: -0.05, p: 0.001 },
    },
  },
  model: {
    referenceAge: 47.35,
    // Uncalibrated modelling choices, kept for compatibility with published outputs
    ratioCoefficientOfVariation: 0.25,
    compositeDivisor: 3,
    thresholds: { high: 1.5, moderate: 0.5, lowModerate: -0.5 },
  },
  treatments: {
    ITBS: {
      name: 'iTBS',
      label: 'Intermittent Theta-Burst Stimulation',
      annualCost: 7500,
      rebate: 4080,
      outOfPocket: 3420,
      moodEvidence: 'B',
      cognitionEvidence: 'GAP',
      description:
        'Non-invasive brain stimulation targeting the DLPFC (MBS items 14216-14220). ' +
        'Not yet trialled for menopausal symptoms; efficacy is not established.',
    },
    MHT: {
      name: 'MHT (HRT)',
      label: 'Menopausal Hormone Therapy',
      annualCost: 380,
      rebate: 0,
      outOfPocket: 380,
      moodEvidence: 'A',
      cognitionEvidence: 'B',
      description:
        'Estrogen with or without progesterone (PBS listed). First-line for vasomotor ' +
        'symptoms; may benefit mood and cognition when started within the critical window.',
    },
    SSRI_SNRI: {
      name: 'SSRI/SNRI',
      label: 'Antidepressant Medication',
      annualCost: 300,
      rebate: 0,
      outOfPocket: 300,
      moodEvidence: 'A',
      cognitionEvidence: 'D',
      description:
        'Escitalopram or desvenlafaxine (PBS generic). Evidence for mood but not cognition; ' +
        'may worsen cognitive symptoms in some women.',
    },
    CBT: {
      name: 'CBT (Better Access)',
      label: 'Cognitive Behavioural Therapy',
      annualCost: 560,
      rebate: 560,
      outOfPocket: 0,
      moodEvidence: 'A',
      cognitionEvidence: 'C',
      description:
        'MBS Better Access, 6 sessions/yr. Evidence for mood and hot-flush coping; ' +
        'limited direct evidence for menopausal cognitive symptoms.',
    },
    MONITORING: {
      name: 'Monitoring Only',
      label: 'Watchful Waiting + Lifestyle',
      annualCost: 320,
      rebate: 165,
      outOfPocket: 155,
      moodEvidence: 'C',
      cognitionEvidence: 'C',
      description:
        'GP monitoring with exercise, sleep and stress management. Cognitive symptoms ' +
        'are usually transient and resolve postmenopause.',
    },
  },
  evidenceProfiles: {
    ITBS: { mood: 6, cognition: 3, vms: 1, costEffectiveness: 5, access: 4, safety: 8 },
    MHT: { mood: 7, cognition: 6, vms: 10, costEffectiveness: 9, access: 9, safety: 7 },
    SSRI_SNRI: { mood: 9, cognition: 2, vms: 5, costEffectiveness: 9, access: 10, safety: 6 },
    CBT: { mood: 8, cognition: 4, vms: 6, costEffectiveness: 8, access: 7, safety: 10 },
    MONITORING: { mood: 2, cognition: 3, vms: 1, costEffectiveness: 10, access: 10, safety: 10 },
  },
  conditions: [
    {
      name: 'Major Depression',
      annualBurdenBillions: 12.6,
      kpLink: 'Elevated KYN/TRP; reduced serotonin',
      hazardRatio: 2.5,
      evidence: 'A',
    },
    {
      name: "Alzheimer's/Dementia",
      annualBurdenBillions: 18.0,
      kpLink: 'Neurotoxic QUIN accumulation',
      hazardRatio: 1.46,
      evidence: 'A',
    },
    {
      name: 'Type 2 Diabetes',
      annualBurdenBillions: 6.3,
      kpLink: 'IDO upregulation; insulin resistance',
      hazardRatio: 1.3,
      evidence: 'B',
    },
    {
      name: 'Cardiovascular Disease',
      annualBurdenBillions: 12.5,
      kpLink: 'KYN predicts cardiovascular events',
      hazardRatio: 1.4,
      evidence: 'A',
    },
    {
      name: 'Anxiety Disorders',
      annualBurdenBillions: 5.8,
      kpLink: 'Serotonin depletion via KP shunt',
      hazardRatio: 1.58,
      evidence: 'A',
    },
    {
      name: 'Osteoporosis',
      annualBurdenBillions: 3.4,
      kpLink: 'TRP to serotonin to bone metabolism',
      hazardRatio: 1.2,
      evidence: 'B',
    },
  ],
  economics: {
    productivityLossPerWoman: 25_917,
    productivityLossBreakdown: [
      { bucket: 'Base_A', label: 'Employee absenteeism', annualAmount: 196, side: 'EMPLOYEE' },
      {
        bucket: 'Employer_A',
        label: 'Employer replacement (SA=0.97)',
        annualAmount: 190,
        side: 'EMPLOYER',
      },
      { bucket: 'Base_P', label: 'Employee presenteeism', annualAmount: 13_166, side: 'EMPLOYEE' },
      {
        bucket: 'Employer_P',
        label: 'Employer friction (SP=0.54)',
        annualAmount: 7_110,
        side: 'EMPLOYER',
      },
      {
        bucket: 'WEP',
        label: 'Workplace environment problems (SWEP=0.72)',
        annualAmount: 5_256,
        side: 'EMPLOYER',
      },
    ],
    efficacy: {
      ITBS: 0.12,
      MHT: 0.15,
      SSRI_SNRI: 0.1,
      CBT: 0.08,
      MONITORING: 0.03,
    },
    kpTargetedItbsEfficacy: 0.22,
    eligiblePopulation: 360_000,
    defaultUptakeFraction: 0.02,
    dementiaLifetimeCost: 442_000,
    perimenopausalPopulation: 2_500_000,
    strongCostEffectivenessThreshold: 50_000,
  },
};

/**
 * Build a validated, immutable reference data set.
 * Overrides replace whole top-level sections of the default tables.
 *
 * @throws ConfigurationError when the resulting tables fail validation
 */
export function createReferenceData(overrides: Partial<ReferenceData> = {}): ReferenceData {
  const result = ReferenceDataSchema.safeParse({ ...DEFAULT_TABLES, ...overrides });

  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError('Reference data validation failed', issues);
  }

  return deepFreeze(result.data);
}

/**
 * Default reference data, constructed once at module load
 */
export const DEFAULT_REFERENCE_DATA: ReferenceData = createReferenceData();
