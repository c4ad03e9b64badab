/**
 * @fileoverview AssessPatientUseCase
 *
 * Orchestrates the decision-support pipeline for one patient:
 *
 *   parse -> KP risk (when biomarkers present) -> treatment ranking
 *         -> cost offsets -> national scaling of the top treatment
 *         -> dementia risk -> dementia cost avoidance -> summary
 *
 * Identical input always yields a deep-equal assessment. Timing and
 * correlation data go to the log only.
 *
 * @module application/use-cases/assess-patient/AssessPatientUseCase
 */

import { performance } from 'node:perf_hooks';

import {
  ValidationError,
  createLogger,
  getEnv,
  uptakeFraction,
  withCorrelationId,
  type EngineEnv,
  type Logger,
} from '@kpcdst/core';
import {
  CostOffsetCalculator,
  DEFAULT_REFERENCE_DATA,
  DementiaRiskScorer,
  KpRiskClassifier,
  TreatmentRanker,
  buildClinicalSummary,
  defaultSubgroupAttributableFraction,
  dementiaCostAvoidance,
  type DementiaRuleTable,
  type TreatmentRuleTable,
} from '@kpcdst/domain';
import {
  PatientProfileSchema,
  ScalingOptionsSchema,
  VALIDATED_AGE_RANGE,
  type PatientAssessment,
  type PatientProfile,
  type Population,
  type ReferenceData,
  type ScalingOptions,
} from '@kpcdst/types';

import type {
  AssessPatientOptions,
  PatientAssessmentService,
} from '../../ports/primary/PatientAssessmentService.js';

const defaultLogger = createLogger({ name: 'assess-patient' });

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeIssues(
  issues: ReadonlyArray<{ readonly path: (string | number)[]; readonly message: string }>
): string {
  return issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validate a raw profile at the boundary
 *
 * A profile without a population takes `defaultPopulation`.
 *
 * @throws ValidationError listing every offending path
 */
export function parsePatientProfile(
  raw: unknown,
  defaultPopulation: Population = 'regional'
): PatientProfile {
  const candidate =
    isRecord(raw) && raw.population === undefined ? { ...raw, population: defaultPopulation } : raw;
  const result = PatientProfileSchema.safeParse(candidate);

  if (!result.success) {
    throw new ValidationError(
      `Invalid patient profile: ${describeIssues(result.error.issues)}`,
      result.error.issues
    );
  }

  return result.data;
}

/**
 * Validate the national scaling overrides of an assessment call
 *
 * @throws ValidationError when uptake is outside 0-1 or the population is not a whole count
 */
export function parseScalingOptions(options: AssessPatientOptions): ScalingOptions {
  const result = ScalingOptionsSchema.safeParse({
    uptakeFraction: options.uptakeFraction,
    eligiblePopulation: options.eligiblePopulation,
  });

  if (!result.success) {
    throw new ValidationError(
      `Invalid assessment options: ${describeIssues(result.error.issues)}`,
      result.error.issues
    );
  }

  return result.data;
}

export interface AssessPatientDeps {
  readonly reference?: ReferenceData;
  readonly treatmentRules?: TreatmentRuleTable;
  readonly dementiaRules?: DementiaRuleTable;
  readonly logger?: Logger;
  /** Defaults for population, eligible population and uptake */
  readonly env?: EngineEnv;
}

/**
 * AssessPatientUseCase
 */
export class AssessPatientUseCase implements PatientAssessmentService {
  private readonly reference: ReferenceData;
  private readonly classifier: KpRiskClassifier;
  private readonly ranker: TreatmentRanker;
  private readonly costs: CostOffsetCalculator;
  private readonly dementia: DementiaRiskScorer;
  private readonly logger: Logger;
  private readonly env: EngineEnv;

  constructor(deps: AssessPatientDeps = {}) {
    this.reference = deps.reference ?? DEFAULT_REFERENCE_DATA;
    this.classifier = new KpRiskClassifier(this.reference);
    this.ranker = new TreatmentRanker({ reference: this.reference, rules: deps.treatmentRules });
    this.costs = new CostOffsetCalculator(this.reference);
    this.dementia = new DementiaRiskScorer(deps.dementiaRules);
    this.logger = deps.logger ?? defaultLogger;
    this.env = deps.env ?? getEnv();
  }

  execute(rawProfile: unknown, options: AssessPatientOptions = {}): PatientAssessment {
    const log = options.correlationId
      ? withCorrelationId(this.logger, options.correlationId)
      : this.logger;
    const startedAt = performance.now();

    let profile: PatientProfile;
    let scaling: ScalingOptions;
    try {
      scaling = parseScalingOptions(options);
      profile = parsePatientProfile(rawProfile, this.env.KPCDST_POPULATION);
    } catch (error) {
      log.warn({ err: error }, 'Assessment request rejected');
      throw error;
    }

    if (profile.age < VALIDATED_AGE_RANGE.min || profile.age > VALIDATED_AGE_RANGE.max) {
      log.warn(
        { age: profile.age, validatedRange: VALIDATED_AGE_RANGE },
        'Age outside the validated range; results are extrapolated'
      );
    }

    const kpRisk = profile.biomarkers
      ? this.classifier.classify({
          trp: profile.biomarkers.trp,
          kyn: profile.biomarkers.kyn,
          sampleType: profile.biomarkers.sampleType,
          population: profile.population,
          age: profile.age,
        })
      : undefined;

    const ranking = this.ranker.rank({
      kpRisk,
      symptoms: profile.symptoms,
      age: profile.age,
      menopausalStage: profile.menopausalStage,
    });

    const costOffsets = this.costs.calculateAll(kpRisk);
    const top = ranking[0]?.treatment ?? 'MONITORING';
    const topTreatmentOffset = this.costs.calculate(top, kpRisk);
    const nationalScaling = this.costs.scaleNationally(top, kpRisk, {
      uptakeFraction: scaling.uptakeFraction ?? uptakeFraction(this.env),
      eligiblePopulation: scaling.eligiblePopulation ?? this.env.KPCDST_ELIGIBLE_POPULATION,
    });

    const dementiaRisk = this.dementia.score({
      riskFactors: profile.riskFactors,
      symptoms: profile.symptoms,
      kpRisk,
      neuroimaging: profile.neuroimaging,
      apoeStatus: profile.apoeStatus,
    });
    const avoidance = dementiaCostAvoidance(
      {
        subgroupAttributableFraction: defaultSubgroupAttributableFraction(
          dementiaRisk.neurovascularLevel
        ),
      },
      this.reference
    );

    const summary = buildClinicalSummary(
      { profile, kpRisk, ranking, topTreatmentOffset, dementiaRisk },
      this.reference
    );

    log.debug({ kpRisk, ranking, dementiaRisk }, 'Assessment detail');
    log.info(
      {
        kpRiskLevel: kpRisk?.level ?? null,
        topTreatment: top,
        dementiaRiskLevel: dementiaRisk.combinedLevel,
        durationMs: Math.round((performance.now() - startedAt) * 100) / 100,
      },
      'Patient assessed'
    );

    return Object.freeze({
      profile,
      kpRisk,
      ranking,
      costOffsets,
      nationalScaling,
      dementiaRisk,
      dementiaCostAvoidance: avoidance,
      summary,
    });
  }
}

export function createAssessPatientUseCase(deps?: AssessPatientDeps): AssessPatientUseCase {
  return new AssessPatientUseCase(deps);
}
