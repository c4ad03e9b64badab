/**
 * @fileoverview Application Layer Package
 *
 * Entry point for presentation layers. Validates raw input at the boundary,
 * wires the pure domain components together and logs each assessment.
 *
 * @module @kpcdst/application
 *
 * ## Usage
 *
 * ```typescript
 * import { createAssessPatientUseCase } from '@kpcdst/application';
 *
 * const assessment = createAssessPatientUseCase().execute({
 *   age: 50,
 *   menopausalStage: 'LATE_PERIMENOPAUSE',
 *   symptoms: ['VASOMOTOR'],
 * });
 * ```
 */

// ============================================================================
// PRIMARY PORTS (Driving Side)
// ============================================================================

export * from './ports/primary/index.js';

// ============================================================================
// USE CASES
// ============================================================================

export * from './use-cases/index.js';
