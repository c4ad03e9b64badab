/**
 * Reference data schemas
 *
 * Population norms, regression coefficients, treatment and economic tables.
 * Every coefficient the engine uses is declared here so that a deployment can
 * supply its own tables and have them validated before use.
 */
import { z } from 'zod';

import { EvidenceGradeSchema } from './clinical.js';

export const NormativeReferenceSchema = z.object({
  mean: z.number().positive(),
  standardDeviation: z.number().nonnegative(),
  unit: z.string().min(1),
});

/**
 * Linear regression effect (slope per year, or female-vs-male difference)
 */
export const RegressionEffectSchema = z.object({
  beta: z.number().finite(),
  p: z.number().min(0).max(1),
});

const MetabolitePairSchema = <T extends z.ZodTypeAny>(value: T) =>
  z.object({ TRP: value, KYN: value });

export const NormativeTableSchema = z.object({
  serum: MetabolitePairSchema(NormativeReferenceSchema),
  plasma: MetabolitePairSchema(NormativeReferenceSchema),
});

export const AgeEffectTableSchema = z.object({
  serum: MetabolitePairSchema(RegressionEffectSchema),
  plasma: MetabolitePairSchema(RegressionEffectSchema),
});

export const TreatmentOptionSchema = z.object({
  name: z.string().min(1),
  label: z.string().min(1),
  annualCost: z.number().nonnegative(),
  rebate: z.number().nonnegative(),
  outOfPocket: z.number().nonnegative(),
  moodEvidence: EvidenceGradeSchema,
  cognitionEvidence: EvidenceGradeSchema,
  description: z.string(),
});

const TreatmentTableSchema = <T extends z.ZodTypeAny>(value: T) =>
  z.object({ ITBS: value, MHT: value, SSRI_SNRI: value, CBT: value, MONITORING: value });

const EvidenceScoreSchema = z.number().int().min(0).max(10);

/**
 * Radar-chart evidence profile, each axis 0-10
 */
export const EvidenceProfileSchema = z.object({
  mood: EvidenceScoreSchema,
  cognition: EvidenceScoreSchema,
  vms: EvidenceScoreSchema,
  costEffectiveness: EvidenceScoreSchema,
  access: EvidenceScoreSchema,
  safety: EvidenceScoreSchema,
});

export const KpConditionSchema = z.object({
  name: z.string().min(1),
  annualBurdenBillions: z.number().nonnegative(),
  kpLink: z.string(),
  hazardRatio: z.number().positive(),
  evidence: EvidenceGradeSchema,
});

export const ProductivityLossBucketSchema = z.object({
  bucket: z.string().min(1),
  label: z.string().min(1),
  annualAmount: z.number().nonnegative(),
  side: z.enum(['EMPLOYEE', 'EMPLOYER']),
});

const FractionSchema = z.number().min(0).max(1);

export const ModelConstantsSchema = z.object({
  /** Mean study age the age regressions are centred on */
  referenceAge: z.number().positive(),
  /** Assumed coefficient of variation of the normative KYN/TRP ratio */
  ratioCoefficientOfVariation: z.number().positive(),
  compositeDivisor: z.number().positive(),
  thresholds: z
    .object({
      high: z.number(),
      moderate: z.number(),
      lowModerate: z.number(),
    })
    .refine((t) => t.high > t.moderate && t.moderate > t.lowModerate, {
      message: 'Thresholds must be strictly descending (high > moderate > lowModerate)',
    }),
});

export const EconomicsSchema = z.object({
  /** Indirect productivity loss per symptomatic employed woman, AUD/yr */
  productivityLossPerWoman: z.number().nonnegative(),
  productivityLossBreakdown: z.array(ProductivityLossBucketSchema),
  efficacy: TreatmentTableSchema(FractionSchema),
  /** iTBS efficacy when selection is guided by a MODERATE/HIGH KP result */
  kpTargetedItbsEfficacy: FractionSchema,
  eligiblePopulation: z.number().int().nonnegative(),
  defaultUptakeFraction: FractionSchema,
  dementiaLifetimeCost: z.number().nonnegative(),
  perimenopausalPopulation: z.number().int().nonnegative(),
  strongCostEffectivenessThreshold: z.number().nonnegative(),
});

export const ReferenceDataSchema = z.object({
  normative: z.object({
    global: NormativeTableSchema,
    regional: NormativeTableSchema,
  }),
  ageEffects: AgeEffectTableSchema,
  sexEffects: z.object({
    serum: MetabolitePairSchema(RegressionEffectSchema),
  }),
  model: ModelConstantsSchema,
  treatments: TreatmentTableSchema(TreatmentOptionSchema),
  evidenceProfiles: TreatmentTableSchema(EvidenceProfileSchema),
  conditions: z.array(KpConditionSchema),
  economics: EconomicsSchema,
});

export type NormativeReference = z.infer<typeof NormativeReferenceSchema>;
export type RegressionEffect = z.infer<typeof RegressionEffectSchema>;
export type NormativeTable = z.infer<typeof NormativeTableSchema>;
export type AgeEffectTable = z.infer<typeof AgeEffectTableSchema>;
export type TreatmentOption = z.infer<typeof TreatmentOptionSchema>;
export type EvidenceProfile = z.infer<typeof EvidenceProfileSchema>;
export type KpCondition = z.infer<typeof KpConditionSchema>;
export type ProductivityLossBucket = z.infer<typeof ProductivityLossBucketSchema>;
export type ModelConstants = z.infer<typeof ModelConstantsSchema>;
export type Economics = z.infer<typeof EconomicsSchema>;
export type ReferenceData = z.infer<typeof ReferenceDataSchema>;
