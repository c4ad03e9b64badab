/**
 * @fileoverview Dementia Risk Rules
 *
 * Point table for the dual-track dementia risk score.
 *
 * CLASSICAL TRACK (max 12):
 *   Bilateral oophorectomy            +3
 *   Early menopause (<45)             +3
 *   Family history of dementia        +2
 *   No MHT during critical window     +1
 *   KP dysregulation HIGH / MODERATE  +2 / +1
 *   Current cognitive symptoms        +1
 *
 * NEUROVASCULAR TRACK, ARIA-H (max 11):
 *   Cerebral microbleeds >=5 / 1-4    +3 / +2
 *   White matter hyperintensities     +2
 *   Superficial siderosis             +3
 *   APOE e4/e4 / e3/e4                +3 / +2
 *
 * @module domain/dementia/dementia-rules
 */

import type { ApoeStatus, KpRiskLevel, RiskFactor, Symptom } from '@kpcdst/types';

import { deepFreeze } from '../shared/freeze.js';

export interface DementiaRule {
  readonly factor: string;
  readonly effectSize: string;
  readonly source: string;
  readonly points: number;
}

export interface MicrobleedTier {
  /** Tier applies when the count is at least this value */
  readonly minCount: number;
  readonly factor: string;
  readonly source: string;
  readonly points: number;
}

export interface DementiaRuleTable {
  /** Evaluation (and reporting) order of the risk-factor rules */
  readonly riskFactorOrder: readonly RiskFactor[];
  readonly riskFactors: Readonly<Record<RiskFactor, DementiaRule | null>>;
  readonly kpRiskLevel: Readonly<Record<KpRiskLevel, DementiaRule | null>>;
  readonly cognitiveSymptoms: {
    readonly triggers: readonly Symptom[];
    readonly rule: DementiaRule;
  };
  /** Highest tier first; at most one tier applies */
  readonly microbleeds: readonly MicrobleedTier[];
  readonly whiteMatterChanges: DementiaRule;
  readonly siderosis: DementiaRule;
  readonly apoe: Readonly<Record<ApoeStatus, DementiaRule | null>>;
  readonly neurovascularLevels: { readonly high: number; readonly moderate: number };
  readonly combinedLevels: {
    readonly critical: number;
    readonly elevated: number;
    readonly moderate: number;
  };
}

export const CLASSICAL_MAX_SCORE = 12;
export const NEUROVASCULAR_MAX_SCORE = 11;

export const DEFAULT_DEMENTIA_RULES = deepFreeze<DementiaRuleTable>({
  riskFactorOrder: [
    'BILATERAL_OOPHORECTOMY',
    'EARLY_MENOPAUSE',
    'FAMILY_HISTORY_DEMENTIA',
    'NO_CURRENT_MHT',
    'HISTORY_OF_DEPRESSION',
  ],
  riskFactors: {
    BILATERAL_OOPHORECTOMY: {
      factor: 'Bilateral oophorectomy <menopause',
      effectSize: 'HR = 1.46',
      source: 'Rocca 2007',
      points: 3,
    },
    EARLY_MENOPAUSE: {
      factor: 'Early menopause (<45)',
      effectSize: 'aOR = 2.21 for MCI',
      source: 'Rocca 2021',
      points: 3,
    },
    FAMILY_HISTORY_DEMENTIA: {
      factor: 'Family history',
      effectSize: 'OR ~2.0',
      source: 'Literature',
      points: 2,
    },
    NO_CURRENT_MHT: {
      factor: 'No MHT during critical window',
      effectSize: '~30% risk reduction missed',
      source: 'Maki 2013',
      points: 1,
    },
    // Informs treatment choice only
    HISTORY_OF_DEPRESSION: null,
  },
  kpRiskLevel: {
    HIGH: {
      factor: 'KP dysregulation (HIGH)',
      effectSize: 'Neurotoxic shift',
      source: 'Metri 2023 + Giil 2016',
      points: 2,
    },
    MODERATE: {
      factor: 'KP activation (MODERATE)',
      effectSize: 'Elevated KYN/TRP',
      source: 'Metri 2023',
      points: 1,
    },
    LOW_MODERATE: null,
    LOW: null,
  },
  cognitiveSymptoms: {
    triggers: ['COGNITIVE_FOG', 'MEMORY_PROBLEMS'],
    rule: {
      factor: 'Current cognitive symptoms',
      effectSize: 'Subjective',
      source: 'Self-report',
      points: 1,
    },
  },
  microbleeds: [
    { minCount: 5, factor: 'Cerebral microbleeds (>=5)', source: 'ARIA-H literature', points: 3 },
    { minCount: 1, factor: 'Cerebral microbleeds (1-4)', source: 'ARIA-H literature', points: 2 },
  ],
  whiteMatterChanges: {
    factor: 'WMH (Fazekas 2-3)',
    effectSize: 'BBB compromise marker',
    source: 'Cerebrovascular lit.',
    points: 2,
  },
  siderosis: {
    factor: 'Superficial siderosis',
    effectSize: 'CAA marker, high BBB vulnerability',
    source: 'ARIA-H literature',
    points: 3,
  },
  apoe: {
    HOMOZYGOUS_E4_E4: {
      factor: 'APOE e4/e4 homozygous',
      effectSize: 'OR ~12 for AD; BBB permeability',
      source: 'Literature',
      points: 3,
    },
    HETEROZYGOUS_E3_E4: {
      factor: 'APOE e3/e4 heterozygous',
      effectSize: 'OR ~3.2 for AD',
      source: 'Literature',
      points: 2,
    },
    NON_CARRIER: null,
    UNKNOWN: null,
  },
  neurovascularLevels: { high: 5, moderate: 2 },
  combinedLevels: { critical: 10, elevated: 6, moderate: 3 },
});
