/**
 * @fileoverview KP Risk Classifier
 *
 * Combines TRP and KYN z-scores with the KYN/TRP ratio deviation into a
 * composite score and a discrete risk level.
 *
 * SCORING ALGORITHM:
 * 1. Age-adjust the TRP and KYN population means
 * 2. trpZ, kynZ against the adjusted means, using the unadjusted SD
 * 3. ratio = KYN / TRP (0 when TRP <= 0)
 * 4. normative ratio from the adjusted means (population means if adjusted TRP <= 0)
 * 5. ratioZ assumes a fixed coefficient of variation for the normative ratio
 * 6. composite = (-trpZ + kynZ + ratioZ) / divisor
 *    Low TRP and high KYN/ratio both raise the composite.
 *
 * Levels (strict comparisons):
 *   composite >  1.5  HIGH
 *   composite >  0.5  MODERATE
 *   composite > -0.5  LOW_MODERATE
 *   otherwise         LOW
 *
 * @module domain/kp-risk/kp-risk-classifier
 */

import type {
  KpRiskLevel,
  KpRiskResult,
  ModelConstants,
  Population,
  ReferenceData,
  SampleType,
} from '@kpcdst/types';

import { DEFAULT_REFERENCE_DATA } from '../reference-data/reference-data.js';
import { ageEffect, normativeReference } from '../reference-data/lookups.js';
import {
  ageAdjust,
  deviationStatus,
  zScore,
  type DeviationStatus,
} from './biomarker-normalizer.js';

export const KP_RISK_INTERPRETATIONS: Readonly<Record<KpRiskLevel, string>> = {
  HIGH: 'Significant KP dysregulation. Elevated neurotoxic shift. Consider intervention.',
  MODERATE:
    'Moderate KP activation. Monitor and consider targeted intervention if symptomatic.',
  LOW_MODERATE: 'Mild KP changes consistent with normal perimenopause transition.',
  LOW: 'KP within normal range. Standard menopause management recommended.',
};

export interface KpRiskInput {
  readonly trp: number;
  readonly kyn: number;
  readonly sampleType: SampleType;
  readonly population: Population;
  readonly age: number;
}

/**
 * Map a composite score to its risk level
 */
export function classifyComposite(
  composite: number,
  thresholds: ModelConstants['thresholds'] = DEFAULT_REFERENCE_DATA.model.thresholds
): KpRiskLevel {
  if (composite > thresholds.high) return 'HIGH';
  if (composite > thresholds.moderate) return 'MODERATE';
  if (composite > thresholds.lowModerate) return 'LOW_MODERATE';
  return 'LOW';
}

export interface BiomarkerFlag {
  readonly marker: 'TRP' | 'KYN' | 'RATIO';
  readonly z: number;
  readonly status: DeviationStatus;
  /** True when the deviation points toward KP dysregulation (low TRP, high KYN or ratio) */
  readonly adverse: boolean;
}

/**
 * Per-marker deviation flags for display
 */
export function biomarkerFlags(result: KpRiskResult): BiomarkerFlag[] {
  const trp = deviationStatus(result.trpZ);
  const kyn = deviationStatus(result.kynZ);
  const ratio = deviationStatus(result.ratioZ);

  return [
    { marker: 'TRP', z: result.trpZ, status: trp, adverse: trp === 'LOW' },
    { marker: 'KYN', z: result.kynZ, status: kyn, adverse: kyn === 'HIGH' },
    { marker: 'RATIO', z: result.ratioZ, status: ratio, adverse: ratio === 'HIGH' },
  ];
}

/**
 * KpRiskClassifier
 *
 * Stateless apart from the injected reference data.
 */
export class KpRiskClassifier {
  private readonly reference: ReferenceData;

  constructor(reference: ReferenceData = DEFAULT_REFERENCE_DATA) {
    this.reference = reference;
  }

  classify(input: KpRiskInput): KpRiskResult {
    const { model } = this.reference;
    const { trp, kyn, sampleType, population, age } = input;

    const trpNorm = normativeReference(this.reference, population, sampleType, 'TRP');
    const kynNorm = normativeReference(this.reference, population, sampleType, 'KYN');

    const adjustedTrpMean = ageAdjust(
      age,
      trpNorm.mean,
      ageEffect(this.reference, sampleType, 'TRP').beta,
      model.referenceAge
    );
    const adjustedKynMean = ageAdjust(
      age,
      kynNorm.mean,
      ageEffect(this.reference, sampleType, 'KYN').beta,
      model.referenceAge
    );

    const trpZ = zScore(trp, adjustedTrpMean, trpNorm.standardDeviation);
    const kynZ = zScore(kyn, adjustedKynMean, kynNorm.standardDeviation);

    const ratio = trp > 0 ? kyn / trp : 0;
    const normativeRatio =
      adjustedTrpMean > 0 ? adjustedKynMean / adjustedTrpMean : kynNorm.mean / trpNorm.mean;
    const ratioZ = zScore(
      ratio,
      normativeRatio,
      normativeRatio * model.ratioCoefficientOfVariation
    );

    const composite = (-trpZ + kynZ + ratioZ) / model.compositeDivisor;
    const level = classifyComposite(composite, model.thresholds);

    return Object.freeze({
      sampleType,
      population,
      trpZ,
      kynZ,
      ratio,
      normativeRatio,
      ratioZ,
      composite,
      level,
      interpretation: KP_RISK_INTERPRETATIONS[level],
      adjustedTrpMean,
      adjustedKynMean,
      populationTrpMean: trpNorm.mean,
      populationKynMean: kynNorm.mean,
    });
  }
}

export function createKpRiskClassifier(reference?: ReferenceData): KpRiskClassifier {
  return new KpRiskClassifier(reference);
}
