/**
 * @fileoverview Treatment Ranker
 *
 * Scores every treatment option from the KP risk level, symptoms,
 * menopausal stage and age, then ranks them. All rules are evaluated for
 * every option; the sum is clamped to [0, 100]. Ties keep table order
 * (iTBS, MHT, SSRI/SNRI, CBT, Monitoring).
 *
 * Risk-level rules only apply when a KP result is available; without
 * biomarkers the ranking rests on symptoms, stage and age alone.
 *
 * @module domain/treatment/treatment-ranker
 */

import {
  TREATMENT_IDS,
  type EvidenceProfile,
  type KpRiskResult,
  type MenopausalStage,
  type ReferenceData,
  type Symptom,
  type TreatmentId,
  type TreatmentRanking,
  type TreatmentScore,
} from '@kpcdst/types';

import { DEFAULT_REFERENCE_DATA } from '../reference-data/reference-data.js';
import { treatmentOption } from '../reference-data/lookups.js';
import {
  DEFAULT_TREATMENT_RULES,
  type TreatmentAdjustments,
  type TreatmentRuleTable,
} from './treatment-rules.js';

export interface TreatmentRankingInput {
  /** KP risk result, when biomarkers were measured */
  readonly kpRisk?: Pick<KpRiskResult, 'level'>;
  readonly symptoms: readonly Symptom[];
  readonly age: number;
  readonly menopausalStage: MenopausalStage;
}

export interface TreatmentRankerOptions {
  readonly reference?: ReferenceData;
  readonly rules?: TreatmentRuleTable;
}

function adjustmentFor(adjustments: TreatmentAdjustments, treatment: TreatmentId): number {
  return adjustments[treatment] ?? 0;
}

/**
 * TreatmentRanker
 */
export class TreatmentRanker {
  private readonly reference: ReferenceData;
  private readonly rules: TreatmentRuleTable;

  constructor(options: TreatmentRankerOptions = {}) {
    this.reference = options.reference ?? DEFAULT_REFERENCE_DATA;
    this.rules = options.rules ?? DEFAULT_TREATMENT_RULES;
  }

  /**
   * Unclamped score for a single treatment
   */
  rawScore(treatment: TreatmentId, input: TreatmentRankingInput): number {
    const { rules } = this;
    let score = rules.baseScore;

    if (input.kpRisk !== undefined) {
      score += adjustmentFor(rules.riskLevel[input.kpRisk.level], treatment);
    }

    for (const symptom of new Set(input.symptoms)) {
      score += adjustmentFor(rules.symptoms[symptom], treatment);
    }

    score += adjustmentFor(rules.stage[input.menopausalStage], treatment);

    if (input.age > rules.age.olderThan) {
      score += adjustmentFor(rules.age.adjustments, treatment);
    }

    return score;
  }

  score(treatment: TreatmentId, input: TreatmentRankingInput): number {
    const { minScore, maxScore } = this.rules;
    return Math.max(minScore, Math.min(maxScore, this.rawScore(treatment, input)));
  }

  /**
   * Rank all treatments, highest score first
   */
  rank(input: TreatmentRankingInput): TreatmentRanking {
    const scored: TreatmentScore[] = TREATMENT_IDS.map((treatment) => ({
      treatment,
      name: treatmentOption(this.reference, treatment).name,
      score: this.score(treatment, input),
    }));

    // Array.prototype.sort is stable, so ties keep table order
    return scored.sort((a, b) => b.score - a.score);
  }
}

export interface EvidenceProfileRow {
  readonly treatment: TreatmentId;
  readonly name: string;
  readonly profile: EvidenceProfile;
}

/**
 * Evidence radar rows for the top-ranked treatments
 */
export function evidenceProfiles(
  ranking: TreatmentRanking,
  reference: ReferenceData = DEFAULT_REFERENCE_DATA,
  top = 3
): EvidenceProfileRow[] {
  return ranking.slice(0, top).map(({ treatment, name }) => ({
    treatment,
    name,
    profile: reference.evidenceProfiles[treatment],
  }));
}

export interface SymptomGroups {
  readonly cognitive: Symptom[];
  readonly mood: Symptom[];
  readonly physical: Symptom[];
}

const COGNITIVE_SYMPTOMS: ReadonlySet<Symptom> = new Set<Symptom>([
  'COGNITIVE_FOG',
  'MEMORY_PROBLEMS',
  'CONCENTRATION_DIFFICULTY',
]);
const MOOD_SYMPTOMS: ReadonlySet<Symptom> = new Set<Symptom>(['DEPRESSION', 'ANXIETY']);

/**
 * Split reported symptoms into cognitive, mood and physical groups, keeping input order
 */
export function groupSymptoms(symptoms: readonly Symptom[]): SymptomGroups {
  return {
    cognitive: symptoms.filter((s) => COGNITIVE_SYMPTOMS.has(s)),
    mood: symptoms.filter((s) => MOOD_SYMPTOMS.has(s)),
    physical: symptoms.filter((s) => !COGNITIVE_SYMPTOMS.has(s) && !MOOD_SYMPTOMS.has(s)),
  };
}

export function createTreatmentRanker(options?: TreatmentRankerOptions): TreatmentRanker {
  return new TreatmentRanker(options);
}
