/**
 * Patient profile schema
 *
 * The only shape the engine accepts from a presentation layer. Biomarkers,
 * neuroimaging and APOE genotype are optional; absence switches off the
 * rules that depend on them.
 */
import { z } from 'zod';

import {
  ApoeStatusSchema,
  MenopausalStageSchema,
  PopulationSchema,
  RiskFactorSchema,
  SampleTypeSchema,
  SymptomSchema,
} from './clinical.js';

/**
 * Age range the regression coefficients and ranking thresholds were validated on.
 * Ages outside it are accepted but flagged.
 */
export const VALIDATED_AGE_RANGE = { min: 40, max: 65 } as const;

const unique = <T>(values: T[]): T[] => Array.from(new Set(values));

/**
 * Serum or plasma TRP/KYN measurement (μM)
 */
export const BiomarkerPanelSchema = z.object({
  sampleType: SampleTypeSchema,
  trp: z.number().finite().nonnegative(),
  kyn: z.number().finite().nonnegative(),
});

/**
 * ARIA-H neuroimaging findings (SWI/T2* and FLAIR MRI)
 */
export const NeuroimagingSchema = z.object({
  microbleedCount: z.number().int().nonnegative(),
  hasWhiteMatterChanges: z.boolean(),
  hasSiderosis: z.boolean(),
});

export const PatientProfileSchema = z.object({
  age: z.number().finite().positive().max(120),
  menopausalStage: MenopausalStageSchema,
  symptoms: z.array(SymptomSchema).default([]).transform(unique),
  riskFactors: z.array(RiskFactorSchema).default([]).transform(unique),
  biomarkers: BiomarkerPanelSchema.optional(),
  neuroimaging: NeuroimagingSchema.optional(),
  apoeStatus: ApoeStatusSchema.default('UNKNOWN'),
  population: PopulationSchema.default('regional'),
});

export type BiomarkerPanel = z.infer<typeof BiomarkerPanelSchema>;
export type Neuroimaging = z.infer<typeof NeuroimagingSchema>;
export type PatientProfile = z.infer<typeof PatientProfileSchema>;
/** Raw, pre-default shape (what a form or JSON file supplies) */
export type PatientProfileInput = z.input<typeof PatientProfileSchema>;
