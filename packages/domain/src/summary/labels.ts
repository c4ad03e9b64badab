/**
 * Display labels for the clinical enumerations
 *
 * @module domain/summary/labels
 */

import type { ApoeStatus, MenopausalStage, RiskFactor, Symptom } from '@kpcdst/types';

export const MENOPAUSAL_STAGE_LABELS: Readonly<Record<MenopausalStage, string>> = {
  EARLY_PERIMENOPAUSE: 'Early perimenopause',
  LATE_PERIMENOPAUSE: 'Late perimenopause',
  EARLY_POSTMENOPAUSE: 'Early postmenopause (<5yr)',
  LATE_POSTMENOPAUSE: 'Late postmenopause (>5yr)',
  SURGICAL_MENOPAUSE: 'Surgical menopause',
};

export const SYMPTOM_LABELS: Readonly<Record<Symptom, string>> = {
  COGNITIVE_FOG: 'Cognitive fog',
  MEMORY_PROBLEMS: 'Memory problems',
  DEPRESSION: 'Depression',
  ANXIETY: 'Anxiety',
  VASOMOTOR: 'Hot flushes/VMS',
  SLEEP_DISTURBANCE: 'Sleep disturbance',
  FATIGUE: 'Fatigue',
  CONCENTRATION_DIFFICULTY: 'Difficulty concentrating at work',
};

export const RISK_FACTOR_LABELS: Readonly<Record<RiskFactor, string>> = {
  EARLY_MENOPAUSE: 'Early/surgical menopause (<45)',
  FAMILY_HISTORY_DEMENTIA: 'Family history of dementia',
  BILATERAL_OOPHORECTOMY: 'Bilateral oophorectomy',
  NO_CURRENT_MHT: 'No current MHT use',
  HISTORY_OF_DEPRESSION: 'History of depression',
};

export const APOE_STATUS_LABELS: Readonly<Record<ApoeStatus, string>> = {
  UNKNOWN: 'Unknown',
  NON_CARRIER: 'Non-carrier',
  HETEROZYGOUS_E3_E4: 'Heterozygous (e3/e4)',
  HOMOZYGOUS_E4_E4: 'Homozygous (e4/e4)',
};

/**
 * LOW_MODERATE -> LOW-MODERATE
 */
export function levelLabel(level: string): string {
  return level.replace(/_/g, '-');
}

/**
 * Whole-dollar amount with thousands separators (locale independent)
 */
export function formatDollars(amount: number): string {
  const sign = amount < 0 ? '-' : '';
  const digits = Math.abs(Math.round(amount)).toString();
  return `${sign}$${digits.replace(/\B(?=(\d{3})+(?!\d))/g, ',')}`;
}
