/**
 * Mineral Wool Cost Calculator - Pallet Packer
 *
 * Packs per pallet from the slab footprint and the pallet footprint. Only the
 * two axis-aligned orientations are tried; mixed layers are not considered.
 */

import { Configuration } from '../types';

export interface PalletLayout {
  per_layer: number;
  layers: number;
  rotated: boolean;
}

function fitCount(span: number, size: number): number {
  return size > 0 ? Math.floor(span / size) : 0;
}

export function calculatePalletLayout(packHeight: number, config: Configuration): PalletLayout {
  const lengthwise =
    fitCount(config.pallet_length_mm, config.slab_length_mm) *
    fitCount(config.pallet_width_mm, config.slab_width_mm);

  // Slab turned 90 degrees on the pallet
  const crosswise =
    fitCount(config.pallet_length_mm, config.slab_width_mm) *
    fitCount(config.pallet_width_mm, config.slab_length_mm);

  const perLayer = Math.max(lengthwise, crosswise, 1);
  const layers = Math.max(fitCount(config.target_pallet_height_mm, packHeight), 1);

  return {
    per_layer: perLayer,
    layers,
    rotated: crosswise > lengthwise
  };
}

export function calculatePacksPerPallet(packHeight: number, config: Configuration): number {
  const layout = calculatePalletLayout(packHeight, config);
  return layout.per_layer * layout.layers;
}
