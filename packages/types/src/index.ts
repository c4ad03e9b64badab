/**
 * KP-CDST Types Package
 *
 * Zod schemas and inferred types shared by every layer. Schemas live in
 * schemas/ and are the single source of truth for both runtime validation
 * and static types.
 *
 * @module @kpcdst/types
 */

// Clinical enumerations
export * from './schemas/clinical.js';

// Patient input
export * from './schemas/patient-profile.js';

// Reference tables (norms, costs, economics)
export * from './schemas/reference-data.js';

// Engine results
export * from './schemas/assessment.js';
