/**
 * Calculator Session Tests
 * Validated edits, atomic calculation and last-good-output retention
 */

import * as XLSX from 'xlsx';
import { CalculatorSession, SessionEngine } from '../packages/engine/src/session';
import { generateDetailedReport } from '../packages/engine/src/export';
import { runCostCalculation } from '../packages/engine/src/solver';
import { DEFAULT_CONFIGURATION, DEFAULT_DENSITIES } from '../packages/engine/src/types';
import { DEFAULT_COST_PER_TON } from './fixtures/configFixtures';

function failingEngine(): SessionEngine {
  return {
    run: () => {
      throw new Error('engine exploded');
    },
    report: generateDetailedReport
  };
}

beforeEach(() => {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('Session Defaults', () => {
  test('should start from the default inputs without results', () => {
    const session = new CalculatorSession();
    const state = session.getState();

    expect(state.config).toEqual(DEFAULT_CONFIGURATION);
    expect(state.densities).toEqual([...DEFAULT_DENSITIES]);
    expect(state.fixed_costs_total).toBe(80000);
    expect(state.has_results).toBe(false);
    expect(state.pack_settings[0]).toEqual({ density: 35, setting: { mode: 'auto' } });
    expect(session.getLastOutput()).toBeNull();
  });

  test('should hand out copies of its state', () => {
    const session = new CalculatorSession();
    session.getDensities().push(999);
    session.getFixedCosts().clear();
    expect(session.getDensities()).toHaveLength(8);
    expect(session.getFixedCosts().size).toBe(3);
  });
});

describe('Configuration Updates', () => {
  test('should accept numbers and decimal comma strings', () => {
    const session = new CalculatorSession();
    const result = session.updateConfiguration({ yield_rate: '0,9', throughput_t_h: 5 });

    expect(result.success).toBe(true);
    expect(session.getConfiguration().yield_rate).toBe(0.9);
    expect(session.getConfiguration().throughput_t_h).toBe(5);
  });

  test('should reject a non-numeric value and leave the configuration untouched', () => {
    const session = new CalculatorSession();
    const result = session.updateConfiguration({ throughput_t_h: 6, yield_rate: 'abc' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.errors[0].code).toBe('ERR_NOT_A_NUMBER');
      expect(result.errors[0].field).toBe('yield_rate');
    }
    expect(session.getConfiguration()).toEqual(DEFAULT_CONFIGURATION);
  });

  test('should reject an unknown parameter', () => {
    const session = new CalculatorSession();
    const result = session.updateConfiguration({ bogus_key: 1 });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.errors[0].code).toBe('ERR_UNKNOWN_FIELD');
    }
  });

  test('should reject values outside their range', () => {
    const session = new CalculatorSession();

    const zeroYield = session.updateConfiguration({ yield_rate: 0 });
    expect(zeroYield.success).toBe(false);
    if (!zeroYield.success) {
      expect(zeroYield.errors[0].code).toBe('ERR_OUT_OF_RANGE');
      expect(zeroYield.errors[0].field).toBe('yield_rate');
    }

    expect(session.updateConfiguration({ throughput_t_h: -1 }).success).toBe(false);
    expect(session.updateConfiguration({ pallets_per_truck: 2.5 }).success).toBe(false);
    expect(session.getConfiguration()).toEqual(DEFAULT_CONFIGURATION);
  });
});

describe('Fixed Cost Ledger Edits', () => {
  test('should add a category and raise the cost per ton', () => {
    const session = new CalculatorSession();
    const added = session.addFixedCost('Maintenance', '20000');

    expect(added).toEqual({ success: true, data: { name: 'Maintenance', rate: 20000 } });
    expect(session.getState().fixed_costs_total).toBe(100000);

    const output = session.calculate();
    expect(output.success).toBe(true);
    if (output.success) {
      expect(output.data.results[0].cost_per_ton).toBe(65993.49);
    }
  });

  test('should overwrite an existing category', () => {
    const session = new CalculatorSession();
    session.addFixedCost('Energy', 25000);
    expect(session.getFixedCosts().get('Energy')).toBe(25000);
    expect(session.getFixedCosts().size).toBe(3);
  });

  test('should reject a blank name or a non-numeric rate', () => {
    const session = new CalculatorSession();

    const blank = session.addFixedCost('   ', 100);
    expect(blank.success).toBe(false);
    if (!blank.success) expect(blank.errors[0].code).toBe('ERR_MISSING_FIELD');

    const notNumeric = session.addFixedCost('Rent', 'lots');
    expect(notNumeric.success).toBe(false);
    if (!notNumeric.success) expect(notNumeric.errors[0].code).toBe('ERR_NOT_A_NUMBER');

    expect(session.getFixedCosts().size).toBe(3);
  });

  test('should remove a category and reject an unknown one', () => {
    const session = new CalculatorSession();

    expect(session.removeFixedCost('Payroll')).toEqual({ success: true, data: { name: 'Payroll', rate: 40000 } });
    expect(session.getState().fixed_costs_total).toBe(40000);

    const missing = session.removeFixedCost('Payroll');
    expect(missing.success).toBe(false);
    if (!missing.success) expect(missing.errors[0].code).toBe('ERR_UNKNOWN_CATEGORY');
  });
});

describe('Density List Edits', () => {
  test('should append a density on auto', () => {
    const session = new CalculatorSession();

    expect(session.addDensity('60')).toEqual({ success: true, data: 60 });
    expect(session.getDensities()).toEqual([...DEFAULT_DENSITIES, 60]);
    expect(session.getPackSetting(60)).toEqual({ mode: 'auto' });
  });

  test('should reject duplicate, non-positive and non-numeric densities', () => {
    const session = new CalculatorSession();

    const duplicate = session.addDensity(50);
    if (!duplicate.success) expect(duplicate.errors[0].code).toBe('ERR_DUPLICATE_DENSITY');

    const negative = session.addDensity(-5);
    if (!negative.success) {
      expect(negative.errors[0].code).toBe('ERR_OUT_OF_RANGE');
      expect(negative.errors[0].message).toBe('density: Density must be positive');
    }

    const text = session.addDensity('heavy');
    if (!text.success) expect(text.errors[0].code).toBe('ERR_NOT_A_NUMBER');

    expect([duplicate.success, negative.success, text.success]).toEqual([false, false, false]);
    expect(session.getDensities()).toEqual([...DEFAULT_DENSITIES]);
  });

  test('should restore the list after an add and remove round trip', () => {
    const session = new CalculatorSession();
    session.addDensity(60);
    session.removeDensity(60);

    expect(session.getDensities()).toEqual([...DEFAULT_DENSITIES]);
    expect(session.getPackSetting(60)).toBeUndefined();
  });

  test('should reject removing a density that is not listed', () => {
    const session = new CalculatorSession();
    const result = session.removeDensity(999);

    expect(result.success).toBe(false);
    if (!result.success) expect(result.errors[0].code).toBe('ERR_UNKNOWN_DENSITY');
  });
});

describe('Pack Settings', () => {
  test('should apply a manual slab count to the next calculation', () => {
    const session = new CalculatorSession({ densities: [50] });
    session.setPackSetting(50, { mode: 'manual', manual_count: 10 });

    const output = session.calculate();
    expect(output.success).toBe(true);
    if (output.success) {
      const [row] = output.data.results;
      expect(row.slabs_per_pack).toBe(10);
      expect(row.packs_per_pallet).toBe(16);
      expect(row.pallet_height_mm).toBe(2000);
      expect(output.data.report).toContain('Mode: manual input (10 slabs)');
    }
  });

  test('should switch back to auto', () => {
    const session = new CalculatorSession({ densities: [50] });
    session.setPackSetting(50, { mode: 'manual', manual_count: 10 });
    session.setPackSetting(50, { mode: 'auto' });

    const output = session.calculate();
    if (output.success) expect(output.data.results[0].slabs_per_pack).toBe(12);
    expect(output.success).toBe(true);
  });

  test('should reject a setting for an unknown density or a non-finite count', () => {
    const session = new CalculatorSession();

    const unknown = session.setPackSetting(999, { mode: 'auto' });
    if (!unknown.success) expect(unknown.errors[0].code).toBe('ERR_UNKNOWN_DENSITY');

    const infinite = session.setPackSetting(50, { mode: 'manual', manual_count: Infinity });
    if (!infinite.success) expect(infinite.errors[0].code).toBe('ERR_NOT_A_NUMBER');

    expect([unknown.success, infinite.success]).toEqual([false, false]);
    expect(session.getPackSetting(50)).toEqual({ mode: 'auto' });
  });
});

describe('Calculation', () => {
  test('should produce one row per density and the report', () => {
    const session = new CalculatorSession();
    const output = session.calculate();

    expect(output.success).toBe(true);
    if (output.success) {
      expect(output.data.results.map(r => r.density)).toEqual([...DEFAULT_DENSITIES]);
      expect(output.data.results[1].cost_per_ton).toBe(DEFAULT_COST_PER_TON);
      expect(output.data.report.split('\n')[0]).toBe(
        '=== STAGE 1: PRODUCTION COST PER TON (EXCLUDING PACKAGING) ==='
      );
    }
    expect(session.getState().has_results).toBe(true);
  });

  test('should be idempotent for unchanged inputs', () => {
    const session = new CalculatorSession();
    const first = session.calculate();
    const second = session.calculate();
    expect(second).toEqual(first);
  });

  test('should commit configuration passed with the run', () => {
    const session = new CalculatorSession({ densities: [50] });
    const output = session.calculate({ yield_rate: '0,9' });

    expect(output.success).toBe(true);
    if (output.success) expect(output.data.results[0].cost_per_ton).toBe(65128.65);
    expect(session.getConfiguration().yield_rate).toBe(0.9);
  });

  test('should keep the previous results when the input is invalid', () => {
    const session = new CalculatorSession();
    const first = session.calculate();
    const rejected = session.calculate({ throughput_t_h: 'fast' });

    expect(rejected.success).toBe(false);
    expect(session.getConfiguration()).toEqual(DEFAULT_CONFIGURATION);
    if (first.success) expect(session.getLastOutput()).toEqual(first.data);
  });

  test('should report a failed run and keep the last good output', () => {
    let shouldFail = false;
    const engine: SessionEngine = {
      run: (...args) => {
        if (shouldFail) throw new Error('engine exploded');
        return runCostCalculation(...args);
      },
      report: generateDetailedReport
    };
    const session = new CalculatorSession({ engine });
    const first = session.calculate();

    shouldFail = true;
    const failed = session.calculate({ yield_rate: 0.5 });

    expect(failed.success).toBe(false);
    if (!failed.success) {
      expect(failed.errors[0].code).toBe('ERR_CALCULATION_FAILED');
      expect(failed.errors[0].message).toBe('Calculation failed: engine exploded');
    }
    expect(session.getConfiguration().yield_rate).toBe(0.97);
    if (first.success) expect(session.getLastOutput()).toEqual(first.data);
  });

  test('should not mutate results already handed out', () => {
    const session = new CalculatorSession();
    const output = session.calculate();
    if (output.success) output.data.results[0].cost_per_ton = 0;

    const stored = session.getLastOutput();
    expect(stored?.results[0].cost_per_ton).toBe(DEFAULT_COST_PER_TON);
  });
});

describe('Explanations and Export', () => {
  test('should explain a column with the session inputs', () => {
    const session = new CalculatorSession();
    session.updateConfiguration({ target_pallet_height_mm: 1800 });
    expect(session.explainColumn('pallet_height_mm', 50).substitution).toBe(
      '600 * floor(1800 / 600) = 1800 mm'
    );
  });

  test('should calculate before exporting when there are no results', () => {
    const session = new CalculatorSession({ densities: [35, 50] });
    const exported = session.exportWorkbook();

    expect(exported.success).toBe(true);
    expect(session.getState().has_results).toBe(true);
    if (exported.success) {
      const workbook = XLSX.read(exported.data, { type: 'buffer' });
      expect(workbook.SheetNames).toEqual(['Price_Calculation', 'Input_Data']);
    }
  });

  test('should report a failed export run', () => {
    const session = new CalculatorSession({ engine: failingEngine() });
    const exported = session.exportWorkbook();

    expect(exported.success).toBe(false);
    if (!exported.success) expect(exported.errors[0].code).toBe('ERR_CALCULATION_FAILED');
  });
});
