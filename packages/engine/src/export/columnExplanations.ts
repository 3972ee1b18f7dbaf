/**
 * Result Column Explanation Engine
 * Generates a description, the general formula and the formula with values
 * substituted for each column of the result table. Used for table tooltips.
 */

import {
  AUTO_PACK_SETTING,
  CURRENCY,
  Configuration,
  FixedCostLedger,
  PackSettings,
  REPORT_DENSITY,
  ResultColumnId,
  RESULT_COLUMNS
} from '../types';
import {
  calculateCostComponents,
  calculateDensityDetail,
  optimizeSlabsPerPack,
  calculatePacksPerPallet,
  resolveSlabCount,
  roundTo,
  sumFixedCosts
} from '../solver';

// ============================================================================
// EXPLANATION TYPES
// ============================================================================

export interface CalculationContext {
  resin_kg_t: number;
  resin_cost_t: number;
  fixed_h: number;
  var_t_ex: number;
  cost_t: number;
  q: number;
  y: number;
  loi: number;
  resin_s: number;
  resin_e: number;
  resin_p: number;
  slab_t: number;
  target_h: number;
  pks_pal: number;
  pals_truck: number;
  slab_length_mm: number;
  slab_width_mm: number;
  target_pallet_height_mm: number;
  hood_price: number;
  stretch_price_pallet: number;
  film_price_per_lm: number;
  film_width_m: number;
  pallet_price: number;
}

export interface ColumnExplanation {
  column: ResultColumnId;
  description: string;
  formula: string;
  substitution: string;
}

// ============================================================================
// CONTEXT
// ============================================================================

export function buildCalculationContext(
  config: Configuration,
  fixedCosts: FixedCostLedger
): CalculationContext {
  const costs = calculateCostComponents(config, sumFixedCosts(fixedCosts));

  // Representative pack: configured thickness at the report density
  const slabs = optimizeSlabsPerPack(config.slab_thickness_mm, REPORT_DENSITY, config);
  const packsPerPallet = calculatePacksPerPallet(slabs * config.slab_thickness_mm, config);

  return {
    resin_kg_t: roundTo(costs.resin_kg_per_ton, 2),
    resin_cost_t: roundTo(costs.resin_cost_per_ton, 2),
    fixed_h: costs.fixed_costs_per_hour,
    var_t_ex: costs.var_cost_ex_binder,
    cost_t: costs.cost_per_ton,
    q: config.throughput_t_h,
    y: config.yield_rate,
    loi: config.loi_percent,
    resin_s: config.resin_solid_content,
    resin_e: config.resin_efficiency,
    resin_p: config.resin_price_per_ton,
    slab_t: config.slab_thickness_mm,
    target_h: config.target_pack_height_mm,
    pks_pal: packsPerPallet,
    pals_truck: config.pallets_per_truck,
    slab_length_mm: config.slab_length_mm,
    slab_width_mm: config.slab_width_mm,
    target_pallet_height_mm: config.target_pallet_height_mm,
    hood_price: config.hood_price,
    stretch_price_pallet: config.stretch_price_pallet,
    film_price_per_lm: config.film_price_per_lm,
    film_width_m: config.film_width_m,
    pallet_price: config.pallet_price
  };
}

// ============================================================================
// EXPLANATION GENERATION
// ============================================================================

export function isResultColumnId(value: string): value is ResultColumnId {
  return RESULT_COLUMNS.some(column => column.id === value);
}

/**
 * Without a density the pack geometry is shown for the report density and
 * density-dependent values print as "...".
 */
export function explainColumn(
  columnId: ResultColumnId,
  config: Configuration,
  fixedCosts: FixedCostLedger,
  density?: number,
  packSettings: PackSettings = new Map()
): ColumnExplanation {
  const ctx = buildCalculationContext(config, fixedCosts);
  const rho = density ?? REPORT_DENSITY;
  const rhoLabel = density !== undefined ? String(density) : 'Density';

  const setting = packSettings.get(rho) ?? AUTO_PACK_SETTING;
  const n = resolveSlabCount(rho, setting, config);
  const detail = calculateDensityDetail(rho, ctx.cost_t, n, config);
  const pkg = detail.packaging;
  const packs = detail.packs_per_pallet;
  const vPack = pkg.pack_volume_m3.toFixed(4);
  const vPal = detail.pallet_volume_m3;
  const pkgM3 = roundTo(detail.packaging_cost_per_m3, 2);

  const known = density !== undefined;
  const value = (x: number): string => (known ? String(roundTo(x, 2)) : '...');
  const operand = (x: number, placeholder: string): string => (known ? String(roundTo(x, 2)) : placeholder);

  const explanations: Record<ResultColumnId, Omit<ColumnExplanation, 'column'>> = {
    density: {
      description: 'Product density.',
      formula: 'Density (kg/m3)',
      substitution: rhoLabel
    },
    cost_per_ton: {
      description:
        'Cost of 1 ton of wool without packaging.\n' +
        'Fixed and variable (raw material/energy) costs are divided by the yield.\n' +
        'Resin is NOT divided: LOI% is set relative to the finished slab weight.',
      formula: '(Fix_h / Q / Yield) + (Var_t / Yield) + Resin_cost_t',
      substitution:
        `(${ctx.fixed_h} / ${ctx.q} / ${ctx.y}) + (${ctx.var_t_ex} / ${ctx.y}) + ` +
        `${ctx.resin_cost_t} = ${ctx.cost_t} ${CURRENCY}/t`
    },
    cost_per_ton_with_packaging: {
      description: 'Cost of 1 ton of wool including all packaging materials.',
      formula: 'Cost_1m3_with_packaging / (Density / 1000)',
      substitution:
        `${operand(detail.total_cost_per_m3, 'TOTAL_m3')} / (${rhoLabel} / 1000) = ` +
        `${value(detail.cost_per_ton_with_packaging)}`
    },
    cost_per_m3: {
      description: 'Cost of the wool in one cubic meter.',
      formula: 'Cost_1t_without_packaging * Density / 1000',
      substitution: `${ctx.cost_t} * ${rhoLabel} / 1000 = ${value(detail.wool_cost_per_m3)}`
    },
    cost_per_m3_with_packaging: {
      description: 'Full cost of one cubic meter (wool + packaging).',
      formula: 'Cost_1m3_without_packaging + Packaging_cost_m3',
      substitution:
        `${operand(detail.wool_cost_per_m3, 'Cost_1m3_without_packaging')} + ${pkgM3} = ` +
        `${value(detail.total_cost_per_m3)}`
    },
    slabs_per_pack: {
      description: 'Number of slabs in one pack.',
      formula: 'Min(Target_height, Max_weight) with pallet height multiplicity',
      substitution: `Optimization for ${rhoLabel} kg/m3 -> ${n} pcs`
    },
    pack_height_mm: {
      description: 'Actual height of the formed pack.',
      formula: 'Slabs_per_pack * Slab_thickness',
      substitution: `${n} * ${ctx.slab_t} = ${pkg.pack_height_mm} mm`
    },
    pack_volume_m3: {
      description: 'Geometric volume of one pack.',
      formula: 'Length * Width * Pack_height',
      substitution:
        `${ctx.slab_length_mm / 1000} * ${ctx.slab_width_mm / 1000} * ${pkg.pack_height_mm / 1000} = ` +
        `${vPack} m3`
    },
    packs_per_pallet: {
      description: 'Number of packs on one pallet.',
      formula: 'Packs_per_layer * floor(Pallet_height / Pack_height)',
      substitution: `${packs} pcs (for pack height ${pkg.pack_height_mm} mm)`
    },
    pallet_height_mm: {
      description: 'Real product height on the pallet (a multiple of the pack height).',
      formula: 'Pack_height * floor(Target_pallet_height / Pack_height)',
      substitution:
        `${pkg.pack_height_mm} * floor(${ctx.target_pallet_height_mm} / ${pkg.pack_height_mm}) = ` +
        `${detail.real_pallet_height_mm} mm`
    },
    pack_weight_kg: {
      description: 'Weight of one pack of finished product.',
      formula: 'Pack_volume * Density',
      substitution: `${vPack} * ${rhoLabel} = ${value(detail.pack_weight_kg)}`
    },
    pallet_weight_kg: {
      description: 'Weight of all wool on one pallet (excluding the pallet itself).',
      formula: 'Pack_weight * Packs_per_pallet',
      substitution: `${operand(detail.pack_weight_kg, 'W_pack')} * ${packs} = ${value(detail.pallet_weight_kg)}`
    },
    pallet_volume_m3: {
      description: 'Product volume on one pallet.',
      formula: 'Pack_volume * Packs_per_pallet',
      substitution: `${vPack} * ${packs} = ${roundTo(vPal, 2)}`
    },
    truck_weight_kg: {
      description: 'Product weight in one truck.',
      formula: 'Pallet_weight * Pallets_per_truck',
      substitution:
        `${operand(detail.pallet_weight_kg, 'W_pallet')} * ${ctx.pals_truck} = ${value(detail.truck_weight_kg)}`
    },
    truck_volume_m3: {
      description: 'Product volume in one truck.',
      formula: 'Pallet_volume * Pallets_per_truck',
      substitution: `${roundTo(vPal, 2)} * ${ctx.pals_truck} = ${roundTo(detail.truck_volume_m3, 2)}`
    },
    packs_per_ton: {
      description: 'Packs per 1 ton.',
      formula: '1000 / Pack_weight',
      substitution:
        `1000 / ${operand(detail.pack_weight_kg, 'W_pack')} = ` +
        `${known && detail.pack_weight_kg > 0 ? String(roundTo(detail.packs_per_ton, 2)) : '...'}`
    },
    pallets_per_ton: {
      description: 'Pallets per 1 ton.',
      formula: '1000 / Pallet_weight',
      substitution:
        `1000 / ${operand(detail.pallet_weight_kg, 'W_pallet')} = ` +
        `${known && detail.pallet_weight_kg > 0 ? String(roundTo(detail.pallets_per_ton, 2)) : '...'}`
    },
    packaging_cost_per_pack: {
      description: 'Packaging cost of one pack.',
      formula: 'Pallet_packaging_cost / Packs_per_pallet',
      substitution: `${pkg.total_pallet_packaging_cost} / ${packs} = ${pkg.packaging_cost_per_pack}`
    },
    packaging_cost_per_pallet: {
      description: 'Packaging cost of the whole pallet.',
      formula: '(Pack_film * Count) + Hood + Stretch',
      substitution:
        `(${pkg.film_cost} * ${packs}) + ${ctx.hood_price} + ${ctx.stretch_price_pallet} = ` +
        `${pkg.total_pallet_packaging_cost}`
    },
    packaging_cost_per_m3: {
      description: 'Packaging cost per 1 m3.',
      formula: 'Pallet_packaging_cost / Pallet_volume',
      substitution: `${pkg.total_pallet_packaging_cost} / ${vPal.toFixed(4)} = ${pkgM3}`
    },
    pallet_cost_with_packaging: {
      description: 'Full cost of one pallet: wool plus packaging.',
      formula: 'Cost_1m3_without_packaging * Pallet_volume + Pallet_packaging_cost',
      substitution:
        `${operand(detail.wool_cost_per_m3, 'Cost_1m3_without_packaging')} * ${vPal.toFixed(4)} + ` +
        `${pkg.total_pallet_packaging_cost} = ${value(detail.pallet_cost_with_packaging)}`
    },
    truck_cost: {
      description: 'Full cost of the product in one truck.',
      formula: 'Pallet_cost * Pallets_per_truck',
      substitution:
        `${operand(detail.pallet_cost_with_packaging, 'Pallet_cost')} * ${ctx.pals_truck} = ` +
        `${value(detail.truck_cost)}`
    },
    pack_price: {
      description: 'Cost of one pack.',
      formula: 'Cost_1m3_with_packaging * Pack_volume',
      substitution: `${operand(detail.total_cost_per_m3, 'TOTAL_m3')} * ${vPack} = ${value(detail.pack_price)}`
    }
  };

  return { column: columnId, ...explanations[columnId] };
}

export function formatColumnExplanation(explanation: ColumnExplanation): string {
  return (
    `${explanation.description}\n\n` +
    `Formula:\n${explanation.formula}\n\n` +
    `Calculation:\n${explanation.substitution}`
  );
}
