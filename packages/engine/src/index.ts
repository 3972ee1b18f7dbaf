/**
 * @minwool/engine
 *
 * Cost model for fibrous insulation boards. This package provides:
 * - Production cost per ton (fixed, variable and binder costs)
 * - Slabs-per-pack optimization against height, weight and pallet stacking
 * - Pallet layout and packaging cost distribution
 * - Per-density rollup to cubic meter, pallet and truck figures
 * - Step-by-step report, column explanations and xlsx export
 */

// Types - data models and defaults
export * from './types';

// Solver - cost, geometry and packaging calculations
export * from './solver';

// Export - report, explanations, workbook
export * from './export';

// Session - editable calculator state
export * from './session';
