/**
 * Mineral Wool Cost Calculator - Cost Aggregator
 *
 * Builds the result table: one row per density, in density list order.
 * The base cost per ton does not depend on density and is computed once;
 * pack geometry, packaging and the volumetric rollup are computed per row.
 */

import {
  AUTO_PACK_SETTING,
  Configuration,
  DensityCostDetail,
  FixedCostLedger,
  PackSetting,
  PackSettings,
  ResultRow
} from '../types';
import { calculateProductionCostPerTon, sumFixedCosts } from './costModel';
import { optimizeSlabsPerPack } from './packOptimizer';
import { calculatePacksPerPallet } from './palletPacker';
import { calculatePackHeightMm, calculatePackagingCost } from './packagingCostModel';
import { roundTo, safeDivide } from './rounding';

// ============================================================================
// PER-DENSITY CALCULATION
// ============================================================================

export function resolveSlabCount(
  density: number,
  setting: PackSetting,
  config: Configuration
): number {
  switch (setting.mode) {
    case 'manual':
      return Math.max(Math.trunc(setting.manual_count), 1);
    case 'auto':
      return optimizeSlabsPerPack(config.slab_thickness_mm, density, config);
  }
}

export function calculateRealPalletHeightMm(packHeight: number, config: Configuration): number {
  const layers = packHeight > 0 ? Math.floor(config.target_pallet_height_mm / packHeight) : 0;
  return layers * packHeight;
}

export function calculateDensityDetail(
  density: number,
  costPerTon: number,
  slabCount: number,
  config: Configuration
): DensityCostDetail {
  const packHeight = calculatePackHeightMm(slabCount, config);
  const packsPerPallet = calculatePacksPerPallet(packHeight, config);
  const packaging = calculatePackagingCost(slabCount, packsPerPallet, config);

  const palletVolume = packaging.pack_volume_m3 * packsPerPallet;

  // Cost per ton -> cost per cubic meter
  const woolCostPerM3 = costPerTon * density / 1000;
  const packagingCostPerM3 = safeDivide(packaging.total_pallet_packaging_cost, palletVolume);

  const woolPalletCost = woolCostPerM3 * palletVolume;
  const palletCostWithPackaging = woolPalletCost + packaging.total_pallet_packaging_cost;
  const totalCostPerM3 = safeDivide(palletCostWithPackaging, palletVolume);
  const costPerTonWithPackaging = safeDivide(totalCostPerM3, density / 1000);

  const packWeight = packaging.pack_volume_m3 * density;
  const palletWeight = packWeight * packsPerPallet;

  return {
    density,
    slab_count: slabCount,
    pack_height_mm: packHeight,
    packs_per_pallet: packsPerPallet,
    packaging,
    pallet_volume_m3: palletVolume,
    wool_cost_per_m3: woolCostPerM3,
    packaging_cost_per_m3: packagingCostPerM3,
    wool_pallet_cost: woolPalletCost,
    pallet_cost_with_packaging: palletCostWithPackaging,
    total_cost_per_m3: totalCostPerM3,
    cost_per_ton_with_packaging: costPerTonWithPackaging,
    pack_weight_kg: packWeight,
    pallet_weight_kg: palletWeight,
    truck_weight_kg: palletWeight * config.pallets_per_truck,
    truck_volume_m3: palletVolume * config.pallets_per_truck,
    truck_cost: palletCostWithPackaging * config.pallets_per_truck,
    real_pallet_height_mm: calculateRealPalletHeightMm(packaging.pack_height_mm, config),
    packs_per_ton: safeDivide(1000, packWeight),
    pallets_per_ton: safeDivide(1000, palletWeight),
    pack_price: totalCostPerM3 * packaging.pack_volume_m3
  };
}

export function toResultRow(detail: DensityCostDetail, costPerTon: number): ResultRow {
  return {
    density: detail.density,
    cost_per_ton: costPerTon,
    cost_per_ton_with_packaging: roundTo(detail.cost_per_ton_with_packaging, 2),
    cost_per_m3: roundTo(detail.wool_cost_per_m3, 2),
    cost_per_m3_with_packaging: roundTo(detail.total_cost_per_m3, 2),
    slabs_per_pack: detail.slab_count,
    pack_height_mm: detail.pack_height_mm,
    pack_volume_m3: roundTo(detail.packaging.pack_volume_m3, 4),
    packs_per_pallet: detail.packs_per_pallet,
    pallet_height_mm: detail.real_pallet_height_mm,
    pack_weight_kg: roundTo(detail.pack_weight_kg, 2),
    pallet_weight_kg: roundTo(detail.pallet_weight_kg, 2),
    pallet_volume_m3: roundTo(detail.pallet_volume_m3, 4),
    truck_weight_kg: roundTo(detail.truck_weight_kg, 2),
    truck_volume_m3: roundTo(detail.truck_volume_m3, 4),
    packs_per_ton: roundTo(detail.packs_per_ton, 2),
    pallets_per_ton: roundTo(detail.pallets_per_ton, 2),
    packaging_cost_per_pack: detail.packaging.packaging_cost_per_pack,
    packaging_cost_per_pallet: detail.packaging.total_pallet_packaging_cost,
    packaging_cost_per_m3: roundTo(detail.packaging_cost_per_m3, 2),
    pallet_cost_with_packaging: roundTo(detail.pallet_cost_with_packaging, 2),
    truck_cost: roundTo(detail.truck_cost, 2),
    pack_price: roundTo(detail.pack_price, 2)
  };
}

// ============================================================================
// MAIN CALCULATION LOOP
// ============================================================================

export function runCostCalculation(
  config: Configuration,
  fixedCosts: FixedCostLedger,
  densities: readonly number[],
  packSettings: PackSettings
): ResultRow[] {
  // Snapshot: the run reads its inputs once.
  const snapshot: Readonly<Configuration> = Object.freeze({ ...config });
  const settings: PackSettings = new Map(packSettings);

  const costPerTon = calculateProductionCostPerTon(snapshot, sumFixedCosts(fixedCosts));

  return [...densities].map(density => {
    const setting = settings.get(density) ?? AUTO_PACK_SETTING;
    const slabCount = resolveSlabCount(density, setting, snapshot);
    const detail = calculateDensityDetail(density, costPerTon, slabCount, snapshot);
    return toResultRow(detail, costPerTon);
  });
}
