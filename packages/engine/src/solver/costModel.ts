/**
 * Mineral Wool Cost Calculator - Production Cost Model
 *
 * Cost of one ton of finished wool before packaging:
 *
 *   cost_t = (fix_h / Q / Y) + (var_t / Y) + resin_t
 *
 * Fixed costs and the non-binder variable costs are spent per ton of melt and
 * only a yield fraction of melt becomes product, so both are divided by Y.
 * The resin term is NOT divided by Y: LOI% is a share of the finished board
 * weight, so resin_t is already per ton of product.
 */

import { Configuration, CostComponents, FixedCostLedger } from '../types';
import { roundTo } from './rounding';

export function sumFixedCosts(ledger: FixedCostLedger): number {
  let total = 0;
  for (const rate of ledger.values()) {
    total += rate;
  }
  return total;
}

export function calculateResinKgPerTon(config: Configuration): number {
  return 1000 * (config.loi_percent / 100) / (config.resin_solid_content * config.resin_efficiency);
}

export function calculateVarCostExBinder(config: Configuration): number {
  return config.var_stone_t + config.var_melting_energy_t + config.var_other_t;
}

/**
 * Unrounded terms of the cost formula; `cost_per_ton` is the only rounded
 * field.
 */
export function calculateCostComponents(
  config: Configuration,
  fixedCostsSum: number
): CostComponents {
  const resinKgPerTon = calculateResinKgPerTon(config);
  const resinCostPerTon = (resinKgPerTon / 1000) * config.resin_price_per_ton;
  const varCostExBinder = calculateVarCostExBinder(config);

  const costPerTon =
    (fixedCostsSum / config.throughput_t_h / config.yield_rate) +
    (varCostExBinder / config.yield_rate) +
    resinCostPerTon;

  return {
    resin_kg_per_ton: resinKgPerTon,
    resin_cost_per_ton: resinCostPerTon,
    fixed_costs_per_hour: fixedCostsSum,
    var_cost_ex_binder: varCostExBinder,
    cost_per_ton: roundTo(costPerTon, 2)
  };
}

export function calculateProductionCostPerTon(config: Configuration, fixedCostsSum: number): number {
  return calculateCostComponents(config, fixedCostsSum).cost_per_ton;
}
