/**
 * @fileoverview Cost Offset Calculator
 *
 * Per-treatment productivity offset against annual treatment cost, and
 * scaling of the top-ranked treatment to national level.
 *
 *   offset     = round(productivity loss x efficacy), ties to even
 *   net        = annual cost - offset
 *   ROI %      = (offset / annual cost - 1) x 100, 0 when cost is 0
 *   break-even = annual cost / offset years, Infinity when offset is 0
 *
 * iTBS efficacy rises to the KP-targeted assumption when selection is
 * guided by a MODERATE or HIGH KP result.
 *
 * @module domain/cost-offset/cost-offset-calculator
 */

import {
  TREATMENT_IDS,
  type CostOffset,
  type KpRiskResult,
  type NationalScaling,
  type ReferenceData,
  type TreatmentId,
} from '@kpcdst/types';

import { DEFAULT_REFERENCE_DATA } from '../reference-data/reference-data.js';
import { treatmentOption } from '../reference-data/lookups.js';
import { roundHalfEven } from '../shared/rounding.js';

/** Break-even sentinel meaning the treatment never pays for itself */
export const NEVER_BREAKS_EVEN = Number.POSITIVE_INFINITY;

export interface NationalScalingOptions {
  /** Fraction of the eligible population treated, 0-1 */
  readonly uptakeFraction?: number;
  readonly eligiblePopulation?: number;
}

/**
 * CostOffsetCalculator
 */
export class CostOffsetCalculator {
  private readonly reference: ReferenceData;

  constructor(reference: ReferenceData = DEFAULT_REFERENCE_DATA) {
    this.reference = reference;
  }

  /**
   * Assumed efficacy for a treatment given the (optional) KP result
   */
  efficacy(treatment: TreatmentId, kpRisk?: Pick<KpRiskResult, 'level'>): number {
    const { efficacy, kpTargetedItbsEfficacy } = this.reference.economics;
    if (treatment === 'ITBS' && (kpRisk?.level === 'HIGH' || kpRisk?.level === 'MODERATE')) {
      return kpTargetedItbsEfficacy;
    }
    return efficacy[treatment];
  }

  /**
   * Annual productivity offset for a treatment, rounded to whole dollars
   */
  offset(treatment: TreatmentId, kpRisk?: Pick<KpRiskResult, 'level'>): number {
    return roundHalfEven(
      this.reference.economics.productivityLossPerWoman * this.efficacy(treatment, kpRisk)
    );
  }

  calculate(treatment: TreatmentId, kpRisk?: Pick<KpRiskResult, 'level'>): CostOffset {
    const { annualCost } = treatmentOption(this.reference, treatment);
    const efficacy = this.efficacy(treatment, kpRisk);
    const offset = this.offset(treatment, kpRisk);

    return Object.freeze({
      treatment,
      annualCost,
      efficacy,
      offset,
      net: annualCost - offset,
      roiPercent: annualCost > 0 ? (offset / annualCost - 1) * 100 : 0,
      breakEvenYears: offset > 0 ? annualCost / offset : NEVER_BREAKS_EVEN,
    });
  }

  /**
   * Cost offsets for every treatment, in table order
   */
  calculateAll(kpRisk?: Pick<KpRiskResult, 'level'>): CostOffset[] {
    return TREATMENT_IDS.map((treatment) => this.calculate(treatment, kpRisk));
  }

  /**
   * Scale one treatment (normally the top-ranked one) to the eligible population
   */
  scaleNationally(
    treatment: TreatmentId,
    kpRisk?: Pick<KpRiskResult, 'level'>,
    options: NationalScalingOptions = {}
  ): NationalScaling {
    const { economics } = this.reference;
    const eligiblePopulation = options.eligiblePopulation ?? economics.eligiblePopulation;
    const uptakeFraction = options.uptakeFraction ?? economics.defaultUptakeFraction;

    const treated = roundHalfEven(eligiblePopulation * uptakeFraction);
    const nationalOffset = treated * this.offset(treatment, kpRisk);
    const nationalCost = treated * treatmentOption(this.reference, treatment).annualCost;

    return Object.freeze({
      treatment,
      eligiblePopulation,
      uptakeFraction,
      treated,
      nationalOffset,
      nationalCost,
      nationalNet: nationalCost - nationalOffset,
    });
  }
}

export function createCostOffsetCalculator(reference?: ReferenceData): CostOffsetCalculator {
  return new CostOffsetCalculator(reference);
}
