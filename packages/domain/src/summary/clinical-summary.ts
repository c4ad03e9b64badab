/**
 * @fileoverview Clinical Summary
 *
 * Copy-friendly plain-text summary of an assessment, one string per line.
 * Empty strings separate sections.
 *
 * @module domain/summary/clinical-summary
 */

import type {
  CostOffset,
  DementiaRiskResult,
  KpRiskResult,
  PatientProfile,
  ReferenceData,
  TreatmentRanking,
} from '@kpcdst/types';

import { DEFAULT_REFERENCE_DATA } from '../reference-data/reference-data.js';
import { CLASSICAL_MAX_SCORE, NEUROVASCULAR_MAX_SCORE } from '../dementia/dementia-rules.js';
import {
  APOE_STATUS_LABELS,
  MENOPAUSAL_STAGE_LABELS,
  RISK_FACTOR_LABELS,
  SYMPTOM_LABELS,
  formatDollars,
  levelLabel,
} from './labels.js';

export interface ClinicalSummaryInput {
  readonly profile: PatientProfile;
  readonly kpRisk?: KpRiskResult;
  readonly ranking: TreatmentRanking;
  /** Cost offset of the top-ranked treatment */
  readonly topTreatmentOffset: CostOffset;
  readonly dementiaRisk: DementiaRiskResult;
}

export function buildClinicalSummary(
  input: ClinicalSummaryInput,
  reference: ReferenceData = DEFAULT_REFERENCE_DATA
): string[] {
  const { profile, kpRisk, ranking, topTreatmentOffset, dementiaRisk } = input;
  const lines: string[] = [];

  lines.push(
    `Patient: ${profile.age}yo female, ${MENOPAUSAL_STAGE_LABELS[profile.menopausalStage]}`
  );
  lines.push(
    `Symptoms: ${
      profile.symptoms.length > 0
        ? profile.symptoms.map((s) => SYMPTOM_LABELS[s]).join(', ')
        : 'None reported'
    }`
  );
  lines.push(
    `Risk Factors: ${
      profile.riskFactors.length > 0
        ? profile.riskFactors.map((r) => RISK_FACTOR_LABELS[r]).join(', ')
        : 'None'
    }`
  );

  if (profile.biomarkers && kpRisk) {
    const { sampleType, trp, kyn } = profile.biomarkers;
    lines.push(
      `KP Biomarkers (${sampleType}): TRP ${trp.toFixed(1)} μM, KYN ${kyn.toFixed(2)} μM, ` +
        `KYN/TRP ${kpRisk.ratio.toFixed(4)}`
    );
    lines.push(
      `KP Risk Level: ${levelLabel(kpRisk.level)} (composite z = ${kpRisk.composite.toFixed(2)})`
    );
    lines.push(`Interpretation: ${kpRisk.interpretation}`);
  } else {
    lines.push('KP Biomarkers: Not available; recommend serum TRP/KYN ($80 AUD)');
  }

  const [recommended, alternative] = ranking;
  lines.push('');
  if (recommended) {
    lines.push(`Recommended Treatment: ${recommended.name} (score ${recommended.score}/100)`);
  }
  if (alternative) {
    lines.push(`Alternative: ${alternative.name} (score ${alternative.score}/100)`);
  }

  const lossPerWoman = reference.economics.productivityLossPerWoman;
  const topName = reference.treatments[topTreatmentOffset.treatment].name;
  lines.push('');
  lines.push(`Estimated annual productivity loss: ${formatDollars(lossPerWoman)} AUD`);
  lines.push(
    `Potential offset with ${topName}: ${formatDollars(topTreatmentOffset.offset)} AUD ` +
      `(${Math.round(topTreatmentOffset.efficacy * 100)}% improvement)`
  );

  lines.push('');
  const maxScore = CLASSICAL_MAX_SCORE + NEUROVASCULAR_MAX_SCORE;
  lines.push(
    `Dementia risk score: ${dementiaRisk.combinedScore}/${maxScore} ` +
      `(${levelLabel(dementiaRisk.combinedLevel)})`
  );
  lines.push(
    `  Classical: ${dementiaRisk.classicalScore}/${CLASSICAL_MAX_SCORE} | ` +
      `ARIA-H/Neurovasc: ${dementiaRisk.neurovascularScore}/${NEUROVASCULAR_MAX_SCORE}`
  );
  if (dementiaRisk.neurovascularLevel !== 'LOW') {
    lines.push(`  Neurovascular vulnerability: ${dementiaRisk.neurovascularLevel}`);
  }

  const imaging = profile.neuroimaging;
  if (imaging && imaging.microbleedCount > 0) {
    lines.push(
      `  CMBs: ${imaging.microbleedCount} | ` +
        `WMH: ${imaging.hasWhiteMatterChanges ? 'Yes' : 'No'} | ` +
        `Siderosis: ${imaging.hasSiderosis ? 'Yes' : 'No'}`
    );
  }
  if (profile.apoeStatus !== 'UNKNOWN' && profile.apoeStatus !== 'NON_CARRIER') {
    lines.push(`  APOE: ${APOE_STATUS_LABELS[profile.apoeStatus]}`);
  }

  return lines;
}
