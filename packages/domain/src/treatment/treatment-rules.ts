/**
 * @fileoverview Treatment Suitability Rules
 *
 * Additive adjustments applied to a base score of 50 per treatment.
 * Every table is an exhaustive Record over its enumeration, so a new
 * symptom or stage does not compile until its row is added here.
 *
 * @module domain/treatment/treatment-rules
 */

import type { KpRiskLevel, MenopausalStage, Symptom, TreatmentId } from '@kpcdst/types';

import { deepFreeze } from '../shared/freeze.js';

/** Point adjustments per treatment; omitted treatments are unaffected */
export type TreatmentAdjustments = Readonly<Partial<Record<TreatmentId, number>>>;

export interface TreatmentRuleTable {
  readonly baseScore: number;
  readonly minScore: number;
  readonly maxScore: number;
  readonly riskLevel: Readonly<Record<KpRiskLevel, TreatmentAdjustments>>;
  readonly symptoms: Readonly<Record<Symptom, TreatmentAdjustments>>;
  readonly stage: Readonly<Record<MenopausalStage, TreatmentAdjustments>>;
  /** Applied when age is strictly above `olderThan` */
  readonly age: { readonly olderThan: number; readonly adjustments: TreatmentAdjustments };
}

export const DEFAULT_TREATMENT_RULES = deepFreeze<TreatmentRuleTable>({
  baseScore: 50,
  minScore: 0,
  maxScore: 100,
  riskLevel: {
    // Strong dysregulation favours the most targeted option; estrogen modulates KP
    HIGH: { ITBS: 30, MHT: 20, MONITORING: -20 },
    MODERATE: { MHT: 20, ITBS: 10 },
    LOW_MODERATE: {},
    LOW: { MONITORING: 20, ITBS: -15 },
  },
  symptoms: {
    // SSRIs may worsen cognitive symptoms
    COGNITIVE_FOG: { ITBS: 15, SSRI_SNRI: -10 },
    MEMORY_PROBLEMS: {},
    DEPRESSION: { SSRI_SNRI: 15, CBT: 15, ITBS: 10 },
    ANXIETY: { SSRI_SNRI: 10, CBT: 10 },
    // MHT is first-line for vasomotor symptoms
    VASOMOTOR: { MHT: 25 },
    SLEEP_DISTURBANCE: { MHT: 10, CBT: 5 },
    FATIGUE: {},
    CONCENTRATION_DIFFICULTY: {},
  },
  stage: {
    EARLY_PERIMENOPAUSE: {},
    // Critical window for MHT
    LATE_PERIMENOPAUSE: { MHT: 10 },
    EARLY_POSTMENOPAUSE: { MHT: 5 },
    // Past the critical window; cognitive symptoms often resolve
    LATE_POSTMENOPAUSE: { MHT: -15, MONITORING: 10 },
    SURGICAL_MENOPAUSE: {},
  },
  age: { olderThan: 55, adjustments: { MONITORING: 5 } },
});
