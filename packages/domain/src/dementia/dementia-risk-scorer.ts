/**
 * @fileoverview Dementia Risk Scorer
 *
 * Exploratory dual-track score: classical menopause-related risk factors
 * plus ARIA-H neurovascular and genetic markers. Every rule that fires is
 * recorded, in firing order, so the score can be audited line by line.
 *
 * Levels:
 *   neurovascular  >=5 HIGH, >=2 MODERATE, else LOW
 *   combined       >=10 CRITICAL, >=6 ELEVATED, >=3 MODERATE, else POPULATION_LEVEL
 *
 * @module domain/dementia/dementia-risk-scorer
 */

import type {
  ApoeStatus,
  ContributingFactor,
  DementiaRiskLevel,
  DementiaRiskResult,
  KpRiskResult,
  Neuroimaging,
  NeurovascularLevel,
  RiskFactor,
  Symptom,
} from '@kpcdst/types';

import {
  DEFAULT_DEMENTIA_RULES,
  type DementiaRule,
  type DementiaRuleTable,
} from './dementia-rules.js';

export interface DementiaRiskInput {
  readonly riskFactors: readonly RiskFactor[];
  readonly symptoms: readonly Symptom[];
  /** KP result, when biomarkers were measured */
  readonly kpRisk?: Pick<KpRiskResult, 'level'>;
  /** MRI findings, when imaging was performed */
  readonly neuroimaging?: Neuroimaging;
  readonly apoeStatus: ApoeStatus;
}

type Track = ContributingFactor['track'];

function toFactor(rule: DementiaRule, track: Track): ContributingFactor {
  return {
    factor: rule.factor,
    effectSize: rule.effectSize,
    source: rule.source,
    points: rule.points,
    track,
  };
}

/**
 * DementiaRiskScorer
 */
export class DementiaRiskScorer {
  private readonly rules: DementiaRuleTable;

  constructor(rules: DementiaRuleTable = DEFAULT_DEMENTIA_RULES) {
    this.rules = rules;
  }

  score(input: DementiaRiskInput): DementiaRiskResult {
    const classical = this.classicalFactors(input);
    const neurovascular = this.neurovascularFactors(input);

    const classicalScore = sumPoints(classical);
    const neurovascularScore = sumPoints(neurovascular);
    const combinedScore = classicalScore + neurovascularScore;

    return Object.freeze({
      classicalScore,
      neurovascularScore,
      combinedScore,
      neurovascularLevel: this.neurovascularLevel(neurovascularScore),
      combinedLevel: this.combinedLevel(combinedScore),
      contributingFactors: [...classical, ...neurovascular],
    });
  }

  neurovascularLevel(score: number): NeurovascularLevel {
    const { high, moderate } = this.rules.neurovascularLevels;
    if (score >= high) return 'HIGH';
    if (score >= moderate) return 'MODERATE';
    return 'LOW';
  }

  combinedLevel(score: number): DementiaRiskLevel {
    const { critical, elevated, moderate } = this.rules.combinedLevels;
    if (score >= critical) return 'CRITICAL';
    if (score >= elevated) return 'ELEVATED';
    if (score >= moderate) return 'MODERATE';
    return 'POPULATION_LEVEL';
  }

  private classicalFactors(input: DementiaRiskInput): ContributingFactor[] {
    const { rules } = this;
    const factors: ContributingFactor[] = [];
    const present = new Set(input.riskFactors);

    for (const riskFactor of rules.riskFactorOrder) {
      const rule = rules.riskFactors[riskFactor];
      if (rule && present.has(riskFactor)) {
        factors.push(toFactor(rule, 'CLASSICAL'));
      }
    }

    if (input.kpRisk) {
      const rule = rules.kpRiskLevel[input.kpRisk.level];
      if (rule) {
        factors.push(toFactor(rule, 'CLASSICAL'));
      }
    }

    const { triggers, rule: cognitiveRule } = rules.cognitiveSymptoms;
    if (input.symptoms.some((s) => triggers.includes(s))) {
      factors.push(toFactor(cognitiveRule, 'CLASSICAL'));
    }

    return factors;
  }

  private neurovascularFactors(input: DementiaRiskInput): ContributingFactor[] {
    const { rules } = this;
    const factors: ContributingFactor[] = [];
    const imaging = input.neuroimaging;

    if (imaging) {
      const count = imaging.microbleedCount;
      const tier = rules.microbleeds.find((t) => count >= t.minCount);
      if (tier) {
        factors.push({
          factor: tier.factor,
          effectSize: `${count} CMBs on MRI`,
          source: tier.source,
          points: tier.points,
          track: 'NEUROVASCULAR',
        });
      }
      if (imaging.hasWhiteMatterChanges) {
        factors.push(toFactor(rules.whiteMatterChanges, 'NEUROVASCULAR'));
      }
      if (imaging.hasSiderosis) {
        factors.push(toFactor(rules.siderosis, 'NEUROVASCULAR'));
      }
    }

    const apoeRule = rules.apoe[input.apoeStatus];
    if (apoeRule) {
      factors.push(toFactor(apoeRule, 'NEUROVASCULAR'));
    }

    return factors;
  }
}

function sumPoints(factors: readonly ContributingFactor[]): number {
  return factors.reduce((total, f) => total + f.points, 0);
}

export function createDementiaRiskScorer(rules?: DementiaRuleTable): DementiaRiskScorer {
  return new DementiaRiskScorer(rules);
}
