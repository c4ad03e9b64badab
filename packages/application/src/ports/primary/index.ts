/**
 * @fileoverview Primary Ports Index
 *
 * Primary ports define what the application offers to the outside world.
 * Driving adapters (CLI, forms) call these contracts.
 *
 * @module application/ports/primary
 */

export type {
  PatientAssessmentService,
  AssessPatientOptions,
} from './PatientAssessmentService.js';
