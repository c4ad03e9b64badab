/**
 * Reference table lookups.
 *
 * The tables are keyed by closed enumerations, so a miss can only come from
 * an unchecked caller (plain JavaScript, a stale form value). Those fail fast
 * instead of silently falling back to a default row.
 *
 * @module domain/reference-data/lookups
 */

import {
  MetaboliteSchema,
  PopulationSchema,
  SampleTypeSchema,
  TreatmentIdSchema,
  TREATMENT_IDS,
  type Metabolite,
  type NormativeReference,
  type Population,
  type ReferenceData,
  type RegressionEffect,
  type SampleType,
  type TreatmentId,
  type TreatmentOption,
} from '@kpcdst/types';
import { ReferenceDataError } from '@kpcdst/core';

function assertMember<T extends string>(options: readonly T[], value: string, table: string): T {
  const match = options.find((option) => option === value);
  if (match === undefined) {
    throw new ReferenceDataError(table, value);
  }
  return match;
}

export function normativeReference(
  reference: ReferenceData,
  population: Population,
  sampleType: SampleType,
  metabolite: Metabolite
): NormativeReference {
  const p = assertMember(PopulationSchema.options, population, 'population');
  const s = assertMember(SampleTypeSchema.options, sampleType, 'sample type');
  const m = assertMember(MetaboliteSchema.options, metabolite, 'metabolite');
  return reference.normative[p][s][m];
}

export function ageEffect(
  reference: ReferenceData,
  sampleType: SampleType,
  metabolite: Metabolite
): RegressionEffect {
  const s = assertMember(SampleTypeSchema.options, sampleType, 'sample type');
  const m = assertMember(MetaboliteSchema.options, metabolite, 'metabolite');
  return reference.ageEffects[s][m];
}

export function treatmentOption(reference: ReferenceData, treatment: TreatmentId): TreatmentOption {
  return reference.treatments[assertMember(TreatmentIdSchema.options, treatment, 'treatment')];
}

/**
 * Resolve a treatment by its display name (e.g. "MHT (HRT)")
 *
 * @throws ReferenceDataError when no treatment carries that name
 */
export function findTreatmentByName(reference: ReferenceData, name: string): TreatmentId {
  const match = TREATMENT_IDS.find((id) => reference.treatments[id].name === name);
  if (match === undefined) {
    throw new ReferenceDataError('treatment', name);
  }
  return match;
}
