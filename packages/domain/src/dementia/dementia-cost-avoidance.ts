/**
 * @fileoverview Dementia Cost Avoidance
 *
 * Avoidable lifetime dementia cost at population level and in a screened
 * high-risk subgroup (ARIA-H positive and KP dysregulated). The
 * attributable fractions are assumptions, not published estimates.
 *
 * @module domain/dementia/dementia-cost-avoidance
 */

import type {
  DementiaCostAvoidance,
  NeurovascularLevel,
  ReferenceData,
} from '@kpcdst/types';

import { DEFAULT_REFERENCE_DATA } from '../reference-data/reference-data.js';
import { roundHalfEven } from '../shared/rounding.js';

export const DEFAULT_POPULATION_ATTRIBUTABLE_FRACTION = 0.03;
export const DEFAULT_SUBGROUP_SIZE = 50_000;

const SUBGROUP_ATTRIBUTABLE_FRACTION: Readonly<Record<NeurovascularLevel, number>> = {
  HIGH: 0.2,
  MODERATE: 0.12,
  LOW: 0.05,
};

/**
 * Subgroup attributable fraction suggested by the patient's neurovascular level
 */
export function defaultSubgroupAttributableFraction(level: NeurovascularLevel): number {
  return SUBGROUP_ATTRIBUTABLE_FRACTION[level];
}

export interface DementiaCostAvoidanceInput {
  readonly populationAttributableFraction?: number;
  readonly subgroupAttributableFraction: number;
  readonly subgroupSize?: number;
}

export function dementiaCostAvoidance(
  input: DementiaCostAvoidanceInput,
  reference: ReferenceData = DEFAULT_REFERENCE_DATA
): DementiaCostAvoidance {
  const { dementiaLifetimeCost, perimenopausalPopulation, strongCostEffectivenessThreshold } =
    reference.economics;
  const populationAf =
    input.populationAttributableFraction ?? DEFAULT_POPULATION_ATTRIBUTABLE_FRACTION;
  const subgroupAf = input.subgroupAttributableFraction;
  const subgroupSize = input.subgroupSize ?? DEFAULT_SUBGROUP_SIZE;

  const perPatientValue = roundHalfEven(subgroupAf * dementiaLifetimeCost);

  return Object.freeze({
    populationAttributableFraction: populationAf,
    populationAvoidableCost: perimenopausalPopulation * populationAf * dementiaLifetimeCost,
    subgroupAttributableFraction: subgroupAf,
    subgroupSize,
    subgroupAvoidableCost: subgroupSize * subgroupAf * dementiaLifetimeCost,
    perPatientValue,
    costEffectiveness:
      perPatientValue > strongCostEffectivenessThreshold
        ? 'STRONGLY_COST_EFFECTIVE'
        : 'COST_EFFECTIVE',
  });
}
