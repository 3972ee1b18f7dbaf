/**
 * Mineral Wool Cost Calculator - Calculator Session
 *
 * The state a presentation layer edits between runs: configuration,
 * fixed-cost ledger, density list and pack settings, plus the last good
 * output. Every mutation validates first and either applies completely or
 * leaves the session untouched.
 */

import type { ZodIssue } from 'zod';
import { configurationSchema, numericInputSchema } from '@shared/schema';
import {
  AUTO_PACK_SETTING,
  CONFIGURATION_KEYS,
  CalculationOutput,
  Configuration,
  ConfigurationKey,
  DEFAULT_CONFIGURATION,
  DEFAULT_DENSITIES,
  DEFAULT_FIXED_COSTS,
  FixedCostEntry,
  FixedCostLedger,
  OperationResult,
  PackSetting,
  PackSettings,
  RawConfigurationInput,
  ResultColumnId,
  ValidationError
} from '../types';
import { runCostCalculation, sumFixedCosts } from '../solver';
import {
  ColumnExplanation,
  explainColumn,
  generateDetailedReport,
  writeResultsWorkbook
} from '../export';

// ============================================================================
// SESSION TYPES
// ============================================================================

export interface SessionEngine {
  run: typeof runCostCalculation;
  report: typeof generateDetailedReport;
}

export interface CalculatorSessionOptions {
  config?: Partial<Configuration>;
  fixedCosts?: readonly FixedCostEntry[];
  densities?: readonly number[];
  engine?: SessionEngine;
}

export interface SessionState {
  config: Configuration;
  fixed_costs: FixedCostEntry[];
  fixed_costs_total: number;
  densities: number[];
  pack_settings: Array<{ density: number; setting: PackSetting }>;
  has_results: boolean;
}

const DEFAULT_ENGINE: SessionEngine = {
  run: runCostCalculation,
  report: generateDetailedReport
};

// ============================================================================
// ERROR BUILDERS
// ============================================================================

function notANumber(field: string, value: unknown): ValidationError {
  return {
    code: 'ERR_NOT_A_NUMBER',
    field,
    message: `${field}: "${String(value)}" is not a number`,
    suggestion: 'Enter a numeric value, e.g. 0.97 or 0,97',
    severity: 'error'
  };
}

function outOfRange(field: string, message: string): ValidationError {
  return {
    code: 'ERR_OUT_OF_RANGE',
    field,
    message: `${field}: ${message}`,
    suggestion: 'Check the allowed range for this parameter',
    severity: 'error'
  };
}

function fromZodIssue(issue: ZodIssue): ValidationError {
  const field = issue.path.join('.');
  if (issue.code === 'unrecognized_keys') {
    return {
      code: 'ERR_UNKNOWN_FIELD',
      field: issue.keys.join(', '),
      message: `Unknown parameter(s): ${issue.keys.join(', ')}`,
      suggestion: 'Use one of the documented configuration keys',
      severity: 'error'
    };
  }
  return outOfRange(field, issue.message);
}

function isConfigurationKey(field: string): field is ConfigurationKey {
  return CONFIGURATION_KEYS.some(key => key === field);
}

function copyOutput(output: CalculationOutput): CalculationOutput {
  return {
    results: output.results.map(row => ({ ...row })),
    report: output.report
  };
}

function copySetting(setting: PackSetting): PackSetting {
  return setting.mode === 'manual'
    ? { mode: 'manual', manual_count: setting.manual_count }
    : { mode: 'auto' };
}

// ============================================================================
// SESSION
// ============================================================================

export class CalculatorSession {
  private config: Configuration;
  private fixedCosts: FixedCostLedger;
  private densities: number[];
  private packSettings: PackSettings;
  private lastOutput: CalculationOutput | null = null;
  private readonly engine: SessionEngine;

  constructor(options: CalculatorSessionOptions = {}) {
    this.config = { ...DEFAULT_CONFIGURATION, ...options.config };
    this.fixedCosts = new Map(
      (options.fixedCosts ?? DEFAULT_FIXED_COSTS).map(entry => [entry.name, entry.rate])
    );
    this.densities = [...(options.densities ?? DEFAULT_DENSITIES)];
    this.packSettings = new Map(this.densities.map(density => [density, AUTO_PACK_SETTING]));
    this.engine = options.engine ?? DEFAULT_ENGINE;
  }

  // --------------------------------------------------------------------------
  // Read access (copies only)
  // --------------------------------------------------------------------------

  getConfiguration(): Configuration {
    return { ...this.config };
  }

  getFixedCosts(): FixedCostLedger {
    return new Map(this.fixedCosts);
  }

  getDensities(): number[] {
    return [...this.densities];
  }

  getPackSetting(density: number): PackSetting | undefined {
    const setting = this.packSettings.get(density);
    return setting ? copySetting(setting) : undefined;
  }

  getLastOutput(): CalculationOutput | null {
    return this.lastOutput ? copyOutput(this.lastOutput) : null;
  }

  getState(): SessionState {
    return {
      config: this.getConfiguration(),
      fixed_costs: [...this.fixedCosts].map(([name, rate]) => ({ name, rate })),
      fixed_costs_total: sumFixedCosts(this.fixedCosts),
      densities: this.getDensities(),
      pack_settings: this.densities.map(density => ({
        density,
        setting: copySetting(this.packSettings.get(density) ?? AUTO_PACK_SETTING)
      })),
      has_results: this.lastOutput !== null
    };
  }

  // --------------------------------------------------------------------------
  // Configuration
  // --------------------------------------------------------------------------

  private buildConfiguration(raw: RawConfigurationInput): OperationResult<Configuration> {
    const errors: ValidationError[] = [];
    const candidate: Record<string, number> = { ...this.config };

    for (const [field, value] of Object.entries(raw)) {
      if (value === undefined) continue;

      if (!isConfigurationKey(field)) {
        errors.push({
          code: 'ERR_UNKNOWN_FIELD',
          field,
          message: `Unknown parameter: ${field}`,
          suggestion: 'Use one of the documented configuration keys',
          severity: 'error'
        });
        continue;
      }

      const parsed = numericInputSchema.safeParse(value);
      if (!parsed.success) {
        errors.push(notANumber(field, value));
        continue;
      }
      candidate[field] = parsed.data;
    }

    if (errors.length > 0) {
      return { success: false, errors };
    }

    const validated = configurationSchema.safeParse(candidate);
    if (!validated.success) {
      return { success: false, errors: validated.error.issues.map(fromZodIssue) };
    }

    return { success: true, data: validated.data };
  }

  updateConfiguration(raw: RawConfigurationInput): OperationResult<Configuration> {
    const result = this.buildConfiguration(raw);
    if (!result.success) return result;

    this.config = result.data;
    return { success: true, data: this.getConfiguration() };
  }

  // --------------------------------------------------------------------------
  // Fixed costs
  // --------------------------------------------------------------------------

  addFixedCost(name: string, rawRate: string | number): OperationResult<FixedCostEntry> {
    const label = name.trim();
    if (!label) {
      return {
        success: false,
        errors: [{
          code: 'ERR_MISSING_FIELD',
          field: 'name',
          message: 'Fixed cost category name is required',
          suggestion: 'Enter a category name, e.g. "Maintenance"',
          severity: 'error'
        }]
      };
    }

    const parsed = numericInputSchema.safeParse(rawRate);
    if (!parsed.success) {
      return { success: false, errors: [notANumber('rate', rawRate)] };
    }

    this.fixedCosts.set(label, parsed.data);
    return { success: true, data: { name: label, rate: parsed.data } };
  }

  removeFixedCost(name: string): OperationResult<FixedCostEntry> {
    const rate = this.fixedCosts.get(name);
    if (rate === undefined) {
      return {
        success: false,
        errors: [{
          code: 'ERR_UNKNOWN_CATEGORY',
          field: 'name',
          message: `Fixed cost category "${name}" does not exist`,
          suggestion: 'Pick a category from the fixed cost list',
          severity: 'error'
        }]
      };
    }

    this.fixedCosts.delete(name);
    return { success: true, data: { name, rate } };
  }

  // --------------------------------------------------------------------------
  // Densities and pack settings
  // --------------------------------------------------------------------------

  private unknownDensity(density: number): OperationResult<never> {
    return {
      success: false,
      errors: [{
        code: 'ERR_UNKNOWN_DENSITY',
        field: 'density',
        message: `Density ${density} is not in the list`,
        suggestion: 'Add the density first',
        severity: 'error'
      }]
    };
  }

  addDensity(raw: string | number): OperationResult<number> {
    const parsed = numericInputSchema.safeParse(raw);
    if (!parsed.success) {
      return { success: false, errors: [notANumber('density', raw)] };
    }

    const density = parsed.data;
    if (density <= 0) {
      return { success: false, errors: [outOfRange('density', 'Density must be positive')] };
    }

    if (this.densities.includes(density)) {
      return {
        success: false,
        errors: [{
          code: 'ERR_DUPLICATE_DENSITY',
          field: 'density',
          message: `Density ${density} is already in the list`,
          suggestion: 'Edit the existing density instead',
          severity: 'error'
        }]
      };
    }

    this.densities.push(density);
    this.packSettings.set(density, AUTO_PACK_SETTING);
    return { success: true, data: density };
  }

  removeDensity(density: number): OperationResult<number> {
    const index = this.densities.indexOf(density);
    if (index === -1) return this.unknownDensity(density);

    this.densities.splice(index, 1);
    this.packSettings.delete(density);
    return { success: true, data: density };
  }

  setPackSetting(density: number, setting: PackSetting): OperationResult<PackSetting> {
    if (!this.densities.includes(density)) return this.unknownDensity(density);

    if (setting.mode === 'manual' && !Number.isFinite(setting.manual_count)) {
      return { success: false, errors: [notANumber('manual_count', setting.manual_count)] };
    }

    this.packSettings.set(density, copySetting(setting));
    return { success: true, data: copySetting(setting) };
  }

  // --------------------------------------------------------------------------
  // Calculation
  // --------------------------------------------------------------------------

  /**
   * Runs the engine on a snapshot of the session. The configuration update
   * and the new output are committed together, and only when the run
   * succeeds; otherwise the previous output stays in place.
   */
  calculate(raw?: RawConfigurationInput): OperationResult<CalculationOutput> {
    let config = this.config;
    if (raw) {
      const built = this.buildConfiguration(raw);
      if (!built.success) return built;
      config = built.data;
    }

    let output: CalculationOutput;
    try {
      output = {
        results: this.engine.run(config, this.fixedCosts, this.densities, this.packSettings),
        report: this.engine.report(config, this.fixedCosts, this.packSettings)
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[calculator] Calculation failed: ${message}`);
      return {
        success: false,
        errors: [{
          code: 'ERR_CALCULATION_FAILED',
          message: `Calculation failed: ${message}`,
          suggestion: 'Review the input parameters and try again',
          severity: 'error'
        }]
      };
    }

    this.config = config;
    this.lastOutput = output;
    console.log(`[calculator] Calculated ${output.results.length} density rows`);

    return { success: true, data: copyOutput(output) };
  }

  explainColumn(columnId: ResultColumnId, density?: number): ColumnExplanation {
    return explainColumn(columnId, this.config, this.fixedCosts, density, this.packSettings);
  }

  exportWorkbook(): OperationResult<Buffer> {
    let output = this.lastOutput;
    if (!output) {
      const calculated = this.calculate();
      if (!calculated.success) return calculated;
      output = calculated.data;
    }

    return { success: true, data: writeResultsWorkbook(output.results, this.config, this.fixedCosts) };
  }
}
