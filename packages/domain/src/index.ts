/**
 * @kpcdst/domain
 *
 * Pure clinical decision-support logic: KP risk classification, treatment
 * ranking, cost offset, dementia risk and the plain-text summary. Nothing
 * here performs I/O; reference data is passed in or taken from the
 * validated defaults.
 *
 * @module @kpcdst/domain
 */

// ============================================================================
// REFERENCE DATA
// ============================================================================

export {
  createReferenceData,
  DEFAULT_REFERENCE_DATA,
} from './reference-data/reference-data.js';

export {
  normativeReference,
  ageEffect,
  treatmentOption,
  findTreatmentByName,
} from './reference-data/lookups.js';

// ============================================================================
// KP RISK
// ============================================================================

export {
  REFERENCE_AGE,
  ageAdjust,
  zScore,
  deviationStatus,
  expectedTrajectory,
  type DeviationStatus,
  type TrajectoryPoint,
} from './kp-risk/biomarker-normalizer.js';

export {
  KpRiskClassifier,
  createKpRiskClassifier,
  classifyComposite,
  biomarkerFlags,
  KP_RISK_INTERPRETATIONS,
  type KpRiskInput,
  type BiomarkerFlag,
} from './kp-risk/kp-risk-classifier.js';

// ============================================================================
// TREATMENT RANKING
// ============================================================================

export {
  DEFAULT_TREATMENT_RULES,
  type TreatmentAdjustments,
  type TreatmentRuleTable,
} from './treatment/treatment-rules.js';

export {
  TreatmentRanker,
  createTreatmentRanker,
  evidenceProfiles,
  groupSymptoms,
  type TreatmentRankingInput,
  type TreatmentRankerOptions,
  type EvidenceProfileRow,
  type SymptomGroups,
} from './treatment/treatment-ranker.js';

// ============================================================================
// COST OFFSET
// ============================================================================

export {
  CostOffsetCalculator,
  createCostOffsetCalculator,
  NEVER_BREAKS_EVEN,
  type NationalScalingOptions,
} from './cost-offset/cost-offset-calculator.js';

// ============================================================================
// DEMENTIA RISK
// ============================================================================

export {
  DEFAULT_DEMENTIA_RULES,
  CLASSICAL_MAX_SCORE,
  NEUROVASCULAR_MAX_SCORE,
  type DementiaRule,
  type MicrobleedTier,
  type DementiaRuleTable,
} from './dementia/dementia-rules.js';

export {
  DementiaRiskScorer,
  createDementiaRiskScorer,
  type DementiaRiskInput,
} from './dementia/dementia-risk-scorer.js';

export {
  dementiaCostAvoidance,
  defaultSubgroupAttributableFraction,
  DEFAULT_POPULATION_ATTRIBUTABLE_FRACTION,
  DEFAULT_SUBGROUP_SIZE,
  type DementiaCostAvoidanceInput,
} from './dementia/dementia-cost-avoidance.js';

// ============================================================================
// SUMMARY
// ============================================================================

export { buildClinicalSummary, type ClinicalSummaryInput } from './summary/clinical-summary.js';

export {
  MENOPAUSAL_STAGE_LABELS,
  SYMPTOM_LABELS,
  RISK_FACTOR_LABELS,
  APOE_STATUS_LABELS,
  levelLabel,
  formatDollars,
} from './summary/labels.js';
