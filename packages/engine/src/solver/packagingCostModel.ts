/**
 * Mineral Wool Cost Calculator - Packaging Cost Model
 *
 * Each pack is wrapped in film around its end profile (pack height x slab
 * width), bought by the linear meter. Each pallet additionally takes one hood
 * and one stretch wrap. Money is rounded once, when the breakdown is built.
 */

import { Configuration, PackagingBreakdown } from '../types';
import { roundTo, safeDivide } from './rounding';

export function calculatePackHeightMm(slabCount: number, config: Configuration): number {
  return slabCount * config.slab_thickness_mm;
}

export function calculatePackPerimeterM(packHeight: number, config: Configuration): number {
  return (2 * packHeight + 2 * config.slab_width_mm) / 1000;
}

export function calculatePackVolumeM3(packHeight: number, config: Configuration): number {
  return (config.slab_length_mm * config.slab_width_mm * packHeight) / 1e9;
}

export function calculatePalletPackagingCost(
  filmCostPerPack: number,
  packsPerPallet: number,
  config: Configuration
): number {
  return (filmCostPerPack * packsPerPallet) + config.hood_price + config.stretch_price_pallet;
}

export function calculatePackagingCost(
  slabCount: number,
  packsPerPallet: number,
  config: Configuration
): PackagingBreakdown {
  const packHeight = calculatePackHeightMm(slabCount, config);
  const filmCost = calculatePackPerimeterM(packHeight, config) * config.film_price_per_lm;
  const palletCost = calculatePalletPackagingCost(filmCost, packsPerPallet, config);

  return {
    slab_count: slabCount,
    pack_height_mm: packHeight,
    film_cost: roundTo(filmCost, 2),
    total_pallet_packaging_cost: roundTo(palletCost, 2),
    packaging_cost_per_pack: roundTo(safeDivide(palletCost, packsPerPallet), 2),
    pack_volume_m3: calculatePackVolumeM3(packHeight, config)
  };
}
