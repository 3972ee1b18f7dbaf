/**
 * Mineral Wool Cost Calculator - Data Types and Models
 *
 * Defines the configuration surface, the fixed-cost ledger, per-density pack
 * settings and the records produced by the calculation pipeline.
 */

// ============================================================================
// CONFIGURATION
// ============================================================================

export interface Configuration {
  // Plant
  throughput_t_h: number;
  yield_rate: number;

  // Binder
  loi_percent: number;
  resin_solid_content: number;
  resin_efficiency: number;
  resin_price_per_ton: number;

  // Variable costs per ton of melt
  var_stone_t: number;
  var_melting_energy_t: number;
  var_other_t: number;

  // Slab geometry
  slab_length_mm: number;
  slab_width_mm: number;
  slab_thickness_mm: number;
  target_pack_height_mm: number;

  // Packaging and logistics
  target_pallet_height_mm: number;
  pallet_length_mm: number;
  pallet_width_mm: number;
  max_pack_weight_kg: number;
  film_price_per_lm: number;
  film_width_m: number;
  pallet_price: number;
  hood_price: number;
  stretch_price_pallet: number;
  pallets_per_truck: number;
}

export type ConfigurationKey = keyof Configuration;

/** Raw form values: numbers, or strings that may use a decimal comma. */
export type RawConfigurationInput = Partial<Record<string, string | number>>;

// Category label -> currency per hour, in insertion order.
export type FixedCostLedger = Map<string, number>;

export interface FixedCostEntry {
  name: string;
  rate: number;
}

// ============================================================================
// PACK SETTINGS
// ============================================================================

export type PackSetting =
  | { mode: 'auto' }
  | { mode: 'manual'; manual_count: number };

export type PackSettings = Map<number, PackSetting>;

export const AUTO_PACK_SETTING: PackSetting = { mode: 'auto' };

// ============================================================================
// CALCULATION RECORDS
// ============================================================================

export interface CostComponents {
  resin_kg_per_ton: number;
  resin_cost_per_ton: number;
  fixed_costs_per_hour: number;
  var_cost_ex_binder: number;
  cost_per_ton: number;
}

export interface PackagingBreakdown {
  slab_count: number;
  pack_height_mm: number;
  film_cost: number;
  total_pallet_packaging_cost: number;
  packaging_cost_per_pack: number;
  pack_volume_m3: number;
}

/**
 * Unrounded per-density figures. The report and the column explanations
 * read these so they print the same numbers the table was built from.
 */
export interface DensityCostDetail {
  density: number;
  slab_count: number;
  pack_height_mm: number;
  packs_per_pallet: number;
  packaging: PackagingBreakdown;
  pallet_volume_m3: number;
  wool_cost_per_m3: number;
  packaging_cost_per_m3: number;
  wool_pallet_cost: number;
  pallet_cost_with_packaging: number;
  total_cost_per_m3: number;
  cost_per_ton_with_packaging: number;
  pack_weight_kg: number;
  pallet_weight_kg: number;
  truck_weight_kg: number;
  truck_volume_m3: number;
  truck_cost: number;
  real_pallet_height_mm: number;
  packs_per_ton: number;
  pallets_per_ton: number;
  pack_price: number;
}

export interface ResultRow {
  density: number;
  cost_per_ton: number;
  cost_per_ton_with_packaging: number;
  cost_per_m3: number;
  cost_per_m3_with_packaging: number;
  slabs_per_pack: number;
  pack_height_mm: number;
  pack_volume_m3: number;
  packs_per_pallet: number;
  pallet_height_mm: number;
  pack_weight_kg: number;
  pallet_weight_kg: number;
  pallet_volume_m3: number;
  truck_weight_kg: number;
  truck_volume_m3: number;
  packs_per_ton: number;
  pallets_per_ton: number;
  packaging_cost_per_pack: number;
  packaging_cost_per_pallet: number;
  packaging_cost_per_m3: number;
  pallet_cost_with_packaging: number;
  truck_cost: number;
  pack_price: number;
}

export type ResultColumnId = keyof ResultRow;

export interface ResultColumn {
  id: ResultColumnId;
  label: string;
  width: number;
}

export interface CalculationOutput {
  results: ResultRow[];
  report: string;
}

// ============================================================================
// ERROR HANDLING
// ============================================================================

export type ErrorCode =
  | 'ERR_NOT_A_NUMBER'
  | 'ERR_OUT_OF_RANGE'
  | 'ERR_MISSING_FIELD'
  | 'ERR_UNKNOWN_FIELD'
  | 'ERR_UNKNOWN_CATEGORY'
  | 'ERR_DUPLICATE_DENSITY'
  | 'ERR_UNKNOWN_DENSITY'
  | 'ERR_NO_RESULTS'
  | 'ERR_CALCULATION_FAILED';

export interface ValidationError {
  code: ErrorCode;
  field?: string;
  message: string;
  suggestion: string;
  severity: 'error' | 'warning';
}

export type OperationResult<T> =
  | { success: true; data: T }
  | { success: false; errors: ValidationError[] };
