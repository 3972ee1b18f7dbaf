/**
 * Mineral Wool Cost Calculator - Pack Optimizer
 *
 * Picks the number of slabs per pack. The pack is bounded by the target pack
 * height and by the maximum pack weight, and its height must divide the
 * pallet content height so every layer on the pallet is a full pack.
 */

import { Configuration, STACKING_TOLERANCE_MM, UNBOUNDED_PACK_COUNT } from '../types';

export function calculateSlabVolumeM3(slabThickness: number, config: Configuration): number {
  return (config.slab_length_mm * config.slab_width_mm * slabThickness) / 1e9;
}

function heightBound(slabThickness: number, config: Configuration): number {
  const count = Math.floor(config.target_pack_height_mm / slabThickness);
  return count < 1 ? 1 : count;
}

function weightBound(slabThickness: number, density: number, config: Configuration): number {
  const slabWeight = calculateSlabVolumeM3(slabThickness, config) * density;
  return slabWeight > 0
    ? Math.floor(config.max_pack_weight_kg / slabWeight)
    : UNBOUNDED_PACK_COUNT;
}

export function stacksCleanly(packHeight: number, palletHeight: number): boolean {
  return packHeight > 0 && Math.abs(palletHeight % packHeight) < STACKING_TOLERANCE_MM;
}

export function optimizeSlabsPerPack(
  slabThickness: number,
  density: number,
  config: Configuration
): number {
  const start = Math.max(1, Math.min(
    heightBound(slabThickness, config),
    weightBound(slabThickness, density, config)
  ));

  // Largest pack whose height is a divisor of the pallet content height.
  for (let n = start; n > 0; n--) {
    if (stacksCleanly(n * slabThickness, config.target_pallet_height_mm)) {
      return n;
    }
  }

  return start;
}
