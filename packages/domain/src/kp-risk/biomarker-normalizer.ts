/**
 * @fileoverview Biomarker Normalizer
 *
 * Age adjustment of normative means and z-score conversion for TRP/KYN.
 * Age regressions are linear and centred on the mean study age, so a patient
 * at exactly the reference age gets the unadjusted population mean.
 *
 * @module domain/kp-risk/biomarker-normalizer
 */

import type { Metabolite, Population, ReferenceData, SampleType } from '@kpcdst/types';

import { ageEffect, normativeReference } from '../reference-data/lookups.js';

/** Mean age of the normative cohort */
export const REFERENCE_AGE = 47.35;

/**
 * Age-adjust a normative mean: `baseMean + slope * (age - referenceAge)`.
 * No bounds are enforced on age; a negative slope lowers the mean with age.
 */
export function ageAdjust(
  age: number,
  baseMean: number,
  slope: number,
  referenceAge: number = REFERENCE_AGE
): number {
  return baseMean + slope * (age - referenceAge);
}

/**
 * Standardised deviation from a reference mean.
 * A zero standard deviation yields 0 rather than a division by zero.
 */
export function zScore(value: number, mean: number, sd: number): number {
  if (sd === 0) {
    return 0;
  }
  return (value - mean) / sd;
}

export type DeviationStatus = 'LOW' | 'NORMAL' | 'HIGH';

/**
 * Bucket a z-score at ±1 SD. Values exactly at ±1 count as NORMAL.
 */
export function deviationStatus(z: number): DeviationStatus {
  if (z < -1) return 'LOW';
  if (z > 1) return 'HIGH';
  return 'NORMAL';
}

export interface TrajectoryPoint {
  readonly age: number;
  readonly expectedMean: number;
}

/**
 * Expected (age-adjusted) normative mean for every whole year in a range
 */
export function expectedTrajectory(
  reference: ReferenceData,
  population: Population,
  sampleType: SampleType,
  metabolite: Metabolite,
  fromAge = 40,
  toAge = 65
): TrajectoryPoint[] {
  const norm = normativeReference(reference, population, sampleType, metabolite);
  const { beta } = ageEffect(reference, sampleType, metabolite);

  const points: TrajectoryPoint[] = [];
  for (let age = fromAge; age <= toAge; age++) {
    points.push({
      age,
      expectedMean: ageAdjust(age, norm.mean, beta, reference.model.referenceAge),
    });
  }
  return points;
}
