/**
 * Packaging Cost Model Tests
 * Film per pack plus hood and stretch per pallet
 */

import {
  calculatePackHeightMm,
  calculatePackPerimeterM,
  calculatePackVolumeM3,
  calculatePackagingCost,
  calculatePalletPackagingCost
} from '../packages/engine/src/solver';
import { makeConfig } from './fixtures/configFixtures';

describe('Pack Geometry', () => {
  const config = makeConfig();

  test('should stack slab thickness into pack height', () => {
    expect(calculatePackHeightMm(12, config)).toBe(600);
  });

  test('should compute the film perimeter in linear meters', () => {
    expect(calculatePackPerimeterM(600, config)).toBe(2.4);
  });

  test('should compute pack volume', () => {
    expect(calculatePackVolumeM3(600, config)).toBeCloseTo(0.432, 10);
  });
});

describe('Packaging Cost', () => {
  const config = makeConfig();

  test('should add hood and stretch to the film of every pack', () => {
    expect(calculatePalletPackagingCost(36, 16, config)).toBe(1226);
  });

  test('should distribute the pallet cost over its packs', () => {
    const cost = calculatePackagingCost(12, 16, config);
    expect(cost.slab_count).toBe(12);
    expect(cost.pack_height_mm).toBe(600);
    expect(cost.film_cost).toBe(36);
    expect(cost.total_pallet_packaging_cost).toBe(1226);
    // 1226 / 16 = 76.625, an exact tie
    expect(cost.packaging_cost_per_pack).toBe(76.62);
    expect(cost.pack_volume_m3).toBeCloseTo(0.432, 10);
  });

  test('should cost less film for a lower pack', () => {
    const cost = calculatePackagingCost(8, 24, config);
    expect(cost.film_cost).toBe(30);
    expect(cost.total_pallet_packaging_cost).toBe(1370);
    expect(cost.packaging_cost_per_pack).toBe(57.08);
  });

  test('should be zero with free materials', () => {
    const free = makeConfig({ film_price_per_lm: 0, hood_price: 0, stretch_price_pallet: 0 });
    const cost = calculatePackagingCost(12, 16, free);
    expect(cost.film_cost).toBe(0);
    expect(cost.total_pallet_packaging_cost).toBe(0);
    expect(cost.packaging_cost_per_pack).toBe(0);
  });

  test('should round a pallet cost stored just above the tie upward', () => {
    const config = makeConfig({ film_price_per_lm: 0, hood_price: 10587.565, stretch_price_pallet: 0 });
    expect(calculatePackagingCost(12, 16, config).total_pallet_packaging_cost).toBe(10587.57);
  });

  test('should not divide by zero packs', () => {
    expect(calculatePackagingCost(12, 0, config).packaging_cost_per_pack).toBe(0);
  });
});
