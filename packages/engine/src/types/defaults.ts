/**
 * Mineral Wool Cost Calculator - Defaults and Constants
 *
 * Reference plant: 4 t/h line, 1200x600 mm slabs on a 2400x1200 mm pallet,
 * 22 pallets per truck.
 */

import {
  Configuration,
  ConfigurationKey,
  FixedCostEntry,
  ResultColumn
} from './costTypes';

// ============================================================================
// DEFAULT INPUTS
// ============================================================================

export const DEFAULT_CONFIGURATION: Readonly<Configuration> = {
  throughput_t_h: 4,
  yield_rate: 0.97,
  loi_percent: 4.5,
  resin_solid_content: 0.5,
  resin_efficiency: 0.95,
  resin_price_per_ton: 60000,
  var_stone_t: 15000,
  var_melting_energy_t: 15000,
  var_other_t: 3500,
  slab_length_mm: 1200,
  slab_width_mm: 600,
  slab_thickness_mm: 50,
  target_pack_height_mm: 600,
  target_pallet_height_mm: 2400,
  pallet_length_mm: 2400,
  pallet_width_mm: 1200,
  max_pack_weight_kg: 30,
  film_price_per_lm: 15,
  film_width_m: 1.4, // reference only, film is bought per linear meter
  pallet_price: 1500, // reference only
  hood_price: 500,
  stretch_price_pallet: 150,
  pallets_per_truck: 22
};

export const CONFIGURATION_KEYS = Object.keys(DEFAULT_CONFIGURATION) as ConfigurationKey[];

export const DEFAULT_FIXED_COSTS: readonly FixedCostEntry[] = [
  { name: 'Payroll', rate: 40000 },
  { name: 'Energy', rate: 20000 },
  { name: 'Depreciation', rate: 20000 }
];

export const DEFAULT_DENSITIES: readonly number[] = [35, 50, 75, 100, 125, 150, 175, 200];

// ============================================================================
// ENGINE CONSTANTS
// ============================================================================

// Density the detailed report and the column explanations walk through.
export const REPORT_DENSITY = 50;

// Pack count used when a slab weighs nothing and weight cannot bound the pack.
export const UNBOUNDED_PACK_COUNT = 999;

export const STACKING_TOLERANCE_MM = 0.001;

export const CURRENCY = 'RUB';

// ============================================================================
// RESULT TABLE LAYOUT
// ============================================================================

export const RESULT_COLUMNS: readonly ResultColumn[] = [
  { id: 'density', label: 'Density kg/m3', width: 70 },
  { id: 'cost_per_ton', label: 'Cost 1t w/o packaging', width: 90 },
  { id: 'cost_per_ton_with_packaging', label: 'Cost 1t with packaging', width: 90 },
  { id: 'cost_per_m3', label: 'Cost 1m3 w/o packaging', width: 95 },
  { id: 'cost_per_m3_with_packaging', label: 'Cost 1m3 with packaging', width: 95 },
  { id: 'slabs_per_pack', label: 'Slabs per pack', width: 45 },
  { id: 'pack_height_mm', label: 'Pack height mm', width: 55 },
  { id: 'pack_volume_m3', label: 'Pack volume m3', width: 70 },
  { id: 'packs_per_pallet', label: 'Packs per pallet', width: 70 },
  { id: 'pallet_height_mm', label: 'Pallet height mm', width: 70 },
  { id: 'pack_weight_kg', label: 'Pack weight kg', width: 80 },
  { id: 'pallet_weight_kg', label: 'Pallet weight kg', width: 80 },
  { id: 'pallet_volume_m3', label: 'Pallet volume m3', width: 80 },
  { id: 'truck_weight_kg', label: 'Truck weight kg', width: 80 },
  { id: 'truck_volume_m3', label: 'Truck volume m3', width: 80 },
  { id: 'packs_per_ton', label: 'Packs per 1t', width: 70 },
  { id: 'pallets_per_ton', label: 'Pallets per 1t', width: 70 },
  { id: 'packaging_cost_per_pack', label: 'Pack packaging RUB', width: 80 },
  { id: 'packaging_cost_per_pallet', label: 'Pallet packaging RUB', width: 90 },
  { id: 'packaging_cost_per_m3', label: 'Packaging RUB/m3', width: 80 },
  { id: 'pallet_cost_with_packaging', label: 'Pallet cost RUB', width: 90 },
  { id: 'truck_cost', label: 'Truck cost RUB', width: 90 },
  { id: 'pack_price', label: 'Pack price RUB', width: 90 }
];
