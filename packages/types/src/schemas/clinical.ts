/**
 * Closed clinical enumerations shared by every layer.
 *
 * Each enumeration is a zod enum so that raw input can be validated at the
 * boundary, and the inferred string-literal union is what the rule tables
 * are keyed on.
 */
import { z } from 'zod';

export const MetaboliteSchema = z.enum(['TRP', 'KYN']).describe('Kynurenine pathway metabolite');

export const SampleTypeSchema = z.enum(['serum', 'plasma']);

/**
 * Normative population: the global pooled means or the Australian regional subset
 */
export const PopulationSchema = z.enum(['global', 'regional']);

/**
 * STRAW+10 staging as captured at intake
 */
export const MenopausalStageSchema = z.enum([
  'EARLY_PERIMENOPAUSE',
  'LATE_PERIMENOPAUSE',
  'EARLY_POSTMENOPAUSE',
  'LATE_POSTMENOPAUSE',
  'SURGICAL_MENOPAUSE',
]);

export const SymptomSchema = z.enum([
  'COGNITIVE_FOG',
  'MEMORY_PROBLEMS',
  'DEPRESSION',
  'ANXIETY',
  'VASOMOTOR',
  'SLEEP_DISTURBANCE',
  'FATIGUE',
  'CONCENTRATION_DIFFICULTY',
]);

export const RiskFactorSchema = z.enum([
  'EARLY_MENOPAUSE',
  'FAMILY_HISTORY_DEMENTIA',
  'BILATERAL_OOPHORECTOMY',
  'NO_CURRENT_MHT',
  'HISTORY_OF_DEPRESSION',
]);

export const ApoeStatusSchema = z.enum([
  'UNKNOWN',
  'NON_CARRIER',
  'HETEROZYGOUS_E3_E4',
  'HOMOZYGOUS_E4_E4',
]);

/**
 * Treatment options, in reference-table order (ties in the ranking keep this order)
 */
export const TreatmentIdSchema = z.enum(['ITBS', 'MHT', 'SSRI_SNRI', 'CBT', 'MONITORING']);

export const KpRiskLevelSchema = z.enum(['LOW', 'LOW_MODERATE', 'MODERATE', 'HIGH']);

export const EvidenceGradeSchema = z.enum(['A', 'B', 'C', 'D', 'GAP']);

export const NeurovascularLevelSchema = z.enum(['LOW', 'MODERATE', 'HIGH']);

export const DementiaRiskLevelSchema = z.enum([
  'POPULATION_LEVEL',
  'MODERATE',
  'ELEVATED',
  'CRITICAL',
]);

export type Metabolite = z.infer<typeof MetaboliteSchema>;
export type SampleType = z.infer<typeof SampleTypeSchema>;
export type Population = z.infer<typeof PopulationSchema>;
export type MenopausalStage = z.infer<typeof MenopausalStageSchema>;
export type Symptom = z.infer<typeof SymptomSchema>;
export type RiskFactor = z.infer<typeof RiskFactorSchema>;
export type ApoeStatus = z.infer<typeof ApoeStatusSchema>;
export type TreatmentId = z.infer<typeof TreatmentIdSchema>;
export type KpRiskLevel = z.infer<typeof KpRiskLevelSchema>;
export type EvidenceGrade = z.infer<typeof EvidenceGradeSchema>;
export type NeurovascularLevel = z.infer<typeof NeurovascularLevelSchema>;
export type DementiaRiskLevel = z.infer<typeof DementiaRiskLevelSchema>;

/** Treatment ids in table order */
export const TREATMENT_IDS: readonly TreatmentId[] = TreatmentIdSchema.options;
