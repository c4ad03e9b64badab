/**
 * Assessment result schemas
 *
 * Everything the engine hands back to a presentation layer. Numbers are kept
 * at full precision; rounding for display happens at the edge.
 */
import { z } from 'zod';

import {
  DementiaRiskLevelSchema,
  KpRiskLevelSchema,
  NeurovascularLevelSchema,
  PopulationSchema,
  SampleTypeSchema,
  TreatmentIdSchema,
} from './clinical.js';
import { PatientProfileSchema } from './patient-profile.js';

export const KpRiskResultSchema = z.object({
  sampleType: SampleTypeSchema,
  population: PopulationSchema,
  trpZ: z.number(),
  kynZ: z.number(),
  /** Measured KYN/TRP ratio (0 when TRP is not positive) */
  ratio: z.number(),
  normativeRatio: z.number(),
  ratioZ: z.number(),
  composite: z.number(),
  level: KpRiskLevelSchema,
  interpretation: z.string(),
  adjustedTrpMean: z.number(),
  adjustedKynMean: z.number(),
  populationTrpMean: z.number(),
  populationKynMean: z.number(),
});

export const TreatmentScoreSchema = z.object({
  treatment: TreatmentIdSchema,
  name: z.string(),
  score: z.number().min(0).max(100),
});

/**
 * Ranked treatments, descending by score; ties keep table order
 */
export const TreatmentRankingSchema = z.array(TreatmentScoreSchema).length(5);

export const ContributingFactorSchema = z.object({
  factor: z.string(),
  effectSize: z.string(),
  source: z.string(),
  points: z.number().int().positive(),
  track: z.enum(['CLASSICAL', 'NEUROVASCULAR']),
});

export const DementiaRiskResultSchema = z.object({
  classicalScore: z.number().int().min(0).max(12),
  neurovascularScore: z.number().int().min(0).max(11),
  combinedScore: z.number().int().min(0).max(23),
  neurovascularLevel: NeurovascularLevelSchema,
  combinedLevel: DementiaRiskLevelSchema,
  contributingFactors: z.array(ContributingFactorSchema),
});

export const CostOffsetSchema = z.object({
  treatment: TreatmentIdSchema,
  annualCost: z.number(),
  efficacy: z.number().min(0).max(1),
  offset: z.number(),
  net: z.number(),
  roiPercent: z.number(),
  /** Years for the offset to repay one year of cost; Infinity when the offset is 0 */
  breakEvenYears: z.number(),
});

export const NationalScalingSchema = z.object({
  treatment: TreatmentIdSchema,
  eligiblePopulation: z.number().int().nonnegative(),
  uptakeFraction: z.number().min(0).max(1),
  treated: z.number().int().nonnegative(),
  nationalOffset: z.number(),
  nationalCost: z.number(),
  nationalNet: z.number(),
});

/** Caller overrides for national scaling; uptake is a fraction, not a percentage */
export const ScalingOptionsSchema = NationalScalingSchema.pick({
  eligiblePopulation: true,
  uptakeFraction: true,
}).partial();

export const CostEffectivenessSchema = z.enum(['STRONGLY_COST_EFFECTIVE', 'COST_EFFECTIVE']);

export const DementiaCostAvoidanceSchema = z.object({
  populationAttributableFraction: z.number().min(0).max(1),
  populationAvoidableCost: z.number().nonnegative(),
  subgroupAttributableFraction: z.number().min(0).max(1),
  subgroupSize: z.number().int().nonnegative(),
  subgroupAvoidableCost: z.number().nonnegative(),
  perPatientValue: z.number().nonnegative(),
  costEffectiveness: CostEffectivenessSchema,
});

export const PatientAssessmentSchema = z.object({
  profile: PatientProfileSchema,
  kpRisk: KpRiskResultSchema.optional(),
  ranking: TreatmentRankingSchema,
  costOffsets: z.array(CostOffsetSchema),
  nationalScaling: NationalScalingSchema,
  dementiaRisk: DementiaRiskResultSchema,
  dementiaCostAvoidance: DementiaCostAvoidanceSchema,
  summary: z.array(z.string()),
});

export type KpRiskResult = z.infer<typeof KpRiskResultSchema>;
export type TreatmentScore = z.infer<typeof TreatmentScoreSchema>;
export type TreatmentRanking = z.infer<typeof TreatmentRankingSchema>;
export type ContributingFactor = z.infer<typeof ContributingFactorSchema>;
export type DementiaRiskResult = z.infer<typeof DementiaRiskResultSchema>;
export type CostOffset = z.infer<typeof CostOffsetSchema>;
export type NationalScaling = z.infer<typeof NationalScalingSchema>;
export type ScalingOptions = z.infer<typeof ScalingOptionsSchema>;
export type CostEffectiveness = z.infer<typeof CostEffectivenessSchema>;
export type DementiaCostAvoidance = z.infer<typeof DementiaCostAvoidanceSchema>;
export type PatientAssessment = z.infer<typeof PatientAssessmentSchema>;
