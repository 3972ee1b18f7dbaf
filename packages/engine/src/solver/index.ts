/**
 * @minwool/engine - Solver Module
 *
 * Production cost, pack and pallet geometry, packaging cost and the
 * per-density aggregation.
 */

export {
  sumFixedCosts,
  calculateResinKgPerTon,
  calculateVarCostExBinder,
  calculateCostComponents,
  calculateProductionCostPerTon
} from './costModel';

export {
  calculateSlabVolumeM3,
  stacksCleanly,
  optimizeSlabsPerPack
} from './packOptimizer';

export {
  calculatePalletLayout,
  calculatePacksPerPallet,
  type PalletLayout
} from './palletPacker';

export * from './packagingCostModel';

export {
  resolveSlabCount,
  calculateRealPalletHeightMm,
  calculateDensityDetail,
  toResultRow,
  runCostCalculation
} from './costAggregator';

export { roundTo, safeDivide } from './rounding';
