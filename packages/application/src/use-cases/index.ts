/**
 * @fileoverview Use Cases Index
 *
 * @module application/use-cases
 */

export * from './assess-patient/index.js';
