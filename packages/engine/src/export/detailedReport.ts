/**
 * Mineral Wool Cost Calculator - Detailed Report
 *
 * Plain-text walk-through of the arithmetic behind one table row. Every
 * operand is printed literally so the numbers can be checked by hand.
 */

import {
  AUTO_PACK_SETTING,
  CURRENCY,
  Configuration,
  FixedCostLedger,
  PackSettings,
  REPORT_DENSITY
} from '../types';
import {
  calculateCostComponents,
  calculateDensityDetail,
  calculatePackPerimeterM,
  resolveSlabCount,
  sumFixedCosts
} from '../solver';

function productionCostSection(config: Configuration, fixedCosts: FixedCostLedger): string[] {
  const costs = calculateCostComponents(config, sumFixedCosts(fixedCosts));
  const fixed = costs.fixed_costs_per_hour;
  const varT = costs.var_cost_ex_binder;
  const lines: string[] = [];

  lines.push('=== STAGE 1: PRODUCTION COST PER TON (EXCLUDING PACKAGING) ===');
  lines.push(
    `1. Resin consumption: 1000 * (${config.loi_percent}% / 100) / ` +
    `(${config.resin_solid_content} * ${config.resin_efficiency}) = ${costs.resin_kg_per_ton.toFixed(2)} kg/t`
  );
  lines.push(
    `2. Resin cost per ton: ${costs.resin_kg_per_ton.toFixed(2)} kg * ` +
    `${(config.resin_price_per_ton / 1000).toFixed(2)} ${CURRENCY}/kg = ${costs.resin_cost_per_ton.toFixed(2)} ${CURRENCY}`
  );
  lines.push(`3. Fixed costs (hourly): total ${fixed} ${CURRENCY}/h`);
  for (const [name, rate] of fixedCosts) {
    lines.push(`   - ${name}: ${rate.toFixed(2)} ${CURRENCY}`);
  }
  lines.push(
    `4. Variable costs (per ton): ${config.var_stone_t} + ${config.var_melting_energy_t} + ` +
    `${config.var_other_t} = ${varT} ${CURRENCY}/t`
  );
  lines.push('5. Final cost per ton formula:');
  // Fixed and variable terms stay separate addends: only they are divided by the yield.
  lines.push(
    `   (${fixed} / ${config.throughput_t_h} / ${config.yield_rate}) + (${varT} / ${config.yield_rate}) + ` +
    `${costs.resin_cost_per_ton} = ${costs.cost_per_ton} ${CURRENCY}/t`
  );

  return lines;
}

export function generateDetailedReport(
  config: Configuration,
  fixedCosts: FixedCostLedger,
  packSettings: PackSettings = new Map()
): string {
  const costPerTon = calculateCostComponents(config, sumFixedCosts(fixedCosts)).cost_per_ton;
  const setting = packSettings.get(REPORT_DENSITY) ?? AUTO_PACK_SETTING;
  const slabCount = resolveSlabCount(REPORT_DENSITY, setting, config);
  const detail = calculateDensityDetail(REPORT_DENSITY, costPerTon, slabCount, config);
  const pkg = detail.packaging;
  const packs = detail.packs_per_pallet;

  const report = productionCostSection(config, fixedCosts);

  // ==========================================================================
  // STAGE 2: PACK GEOMETRY AND PACKAGING
  // ==========================================================================

  report.push('');
  report.push(`=== STAGE 2: GEOMETRY AND PACKAGING (density ${REPORT_DENSITY} kg/m3) ===`);

  if (setting.mode === 'manual') {
    report.push(`Mode: manual input (${slabCount} slabs)`);
  } else {
    report.push(`1. Pack optimization (for ${REPORT_DENSITY} kg/m3):`);
    report.push(`   - Target pack height: ${config.target_pack_height_mm} mm`);
    report.push(`   - Max pack weight: ${config.max_pack_weight_kg} kg`);
    report.push(`   - Pallet content height: ${config.target_pallet_height_mm} mm`);
    report.push(`   -> Result: ${slabCount} slabs (height ${detail.pack_height_mm} mm)`);
  }

  const perimeter = calculatePackPerimeterM(detail.pack_height_mm, config);

  report.push(
    `2. Film per pack (linear m): (2*${detail.pack_height_mm} + 2*${config.slab_width_mm}) / 1000 = ` +
    `${perimeter.toFixed(3)} lm`
  );
  report.push(`   Assumed: film width ${config.film_width_m} m, price is set per linear meter.`);
  report.push(
    `3. Film cost per pack: ${perimeter.toFixed(3)} lm * ${config.film_price_per_lm} ${CURRENCY}/lm = ` +
    `${pkg.film_cost} ${CURRENCY}`
  );
  report.push(
    `4. Hood share: ${config.hood_price} ${CURRENCY} / ${packs} packs = ` +
    `${(config.hood_price / packs).toFixed(2)} ${CURRENCY}`
  );
  report.push(
    `5. Stretch share: ${config.stretch_price_pallet} ${CURRENCY} / ${packs} packs = ` +
    `${(config.stretch_price_pallet / packs).toFixed(2)} ${CURRENCY}`
  );
  report.push(`6. Total packaging per pack (distributed): ${pkg.packaging_cost_per_pack} ${CURRENCY}`);
  report.push(
    `7. Total packaging per pallet: (${pkg.film_cost} * ${packs}) + ${config.hood_price} + ` +
    `${config.stretch_price_pallet} = ${pkg.total_pallet_packaging_cost} ${CURRENCY}`
  );

  // ==========================================================================
  // STAGE 3: VOLUME ROLLUP
  // ==========================================================================

  const palletVolume = detail.pallet_volume_m3.toFixed(4);
  const palletCost = detail.pallet_cost_with_packaging.toFixed(2);

  report.push('');
  report.push('=== STAGE 3: CONVERSION TO VOLUME (m3) ===');
  report.push(`1. Pallet volume: ${pkg.pack_volume_m3.toFixed(4)} * ${packs} = ${palletVolume} m3`);
  report.push(
    `2. Wool cost per pallet: ${detail.wool_cost_per_m3.toFixed(2)} * ${palletVolume} = ` +
    `${detail.wool_pallet_cost.toFixed(2)} ${CURRENCY}`
  );
  report.push(
    `3. Pallet cost with packaging: ${detail.wool_pallet_cost.toFixed(2)} + ` +
    `${pkg.total_pallet_packaging_cost} = ${palletCost} ${CURRENCY}`
  );
  report.push(
    `4. Cost per m3 with packaging: ${palletCost} / ${palletVolume} = ` +
    `${detail.total_cost_per_m3.toFixed(2)} ${CURRENCY}`
  );
  report.push(
    `5. Packaging cost per m3: ${pkg.total_pallet_packaging_cost} / ${palletVolume} = ` +
    `${detail.packaging_cost_per_m3.toFixed(2)} ${CURRENCY}`
  );

  report.push('');
  report.push('* Note: other densities are calculated the same way with the density substituted.');

  return report.join('\n');
}
