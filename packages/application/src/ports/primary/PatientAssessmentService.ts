/**
 * @fileoverview Primary Port - PatientAssessmentService
 *
 * What the application offers to a presentation layer (form, CLI, notebook):
 * one synchronous call from a raw patient profile to an immutable assessment.
 *
 * @module application/ports/primary/PatientAssessmentService
 */

import type { PatientAssessment } from '@kpcdst/types';

export interface AssessPatientOptions {
  /** Fraction of the eligible population assumed treated, 0-1 */
  readonly uptakeFraction?: number;
  readonly eligiblePopulation?: number;
  /** Attached to every log line of this assessment */
  readonly correlationId?: string;
}

/**
 * PRIMARY PORT
 *
 * @example
 * ```typescript
 * const assessment = service.execute(JSON.parse(body), { correlationId });
 * for (const line of assessment.summary) console.log(line);
 * ```
 */
export interface PatientAssessmentService {
  /**
   * Validate a raw profile and run the full decision-support pipeline
   *
   * @throws ValidationError when the profile or the scaling options do not parse
   */
  execute(rawProfile: unknown, options?: AssessPatientOptions): PatientAssessment;
}
