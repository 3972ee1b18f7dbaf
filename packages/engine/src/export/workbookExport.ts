/**
 * Mineral Wool Cost Calculator - Workbook Export
 *
 * Writes the result table and the inputs that produced it to a two-sheet
 * xlsx workbook.
 */

import * as XLSX from 'xlsx';
import {
  CONFIGURATION_KEYS,
  Configuration,
  FixedCostLedger,
  RESULT_COLUMNS,
  ResultRow
} from '../types';

export const RESULTS_SHEET = 'Price_Calculation';
export const INPUTS_SHEET = 'Input_Data';
export const FIXED_COSTS_SEPARATOR = '--- Fixed costs ---';
export const DEFAULT_EXPORT_FILENAME = 'minwool_cost_model.xlsx';

const COLUMN_WIDTH_CHARS = 18;

type SheetRow = Array<string | number>;

function resultRows(rows: readonly ResultRow[]): SheetRow[] {
  const header: SheetRow = RESULT_COLUMNS.map(column => column.label);
  const body = rows.map(row => RESULT_COLUMNS.map(column => row[column.id]));
  return [header, ...body];
}

function parameterRows(config: Configuration, fixedCosts: FixedCostLedger): SheetRow[] {
  const rows: SheetRow[] = [['Parameter', 'Value']];

  for (const key of CONFIGURATION_KEYS) {
    rows.push([key, config[key]]);
  }

  rows.push([FIXED_COSTS_SEPARATOR, '']);
  for (const [name, rate] of fixedCosts) {
    rows.push([name, rate]);
  }

  return rows;
}

export function buildResultsWorkbook(
  rows: readonly ResultRow[],
  config: Configuration,
  fixedCosts: FixedCostLedger
): XLSX.WorkBook {
  const workbook = XLSX.utils.book_new();

  const results = XLSX.utils.aoa_to_sheet(resultRows(rows));
  results['!cols'] = RESULT_COLUMNS.map(() => ({ wch: COLUMN_WIDTH_CHARS }));
  XLSX.utils.book_append_sheet(workbook, results, RESULTS_SHEET);

  const inputs = XLSX.utils.aoa_to_sheet(parameterRows(config, fixedCosts));
  XLSX.utils.book_append_sheet(workbook, inputs, INPUTS_SHEET);

  return workbook;
}

export function writeResultsWorkbook(
  rows: readonly ResultRow[],
  config: Configuration,
  fixedCosts: FixedCostLedger
): Buffer {
  const workbook = buildResultsWorkbook(rows, config, fixedCosts);
  const data: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  return data;
}

export function saveResultsWorkbook(
  rows: readonly ResultRow[],
  config: Configuration,
  fixedCosts: FixedCostLedger,
  filename: string = DEFAULT_EXPORT_FILENAME
): string {
  XLSX.writeFile(buildResultsWorkbook(rows, config, fixedCosts), filename);
  console.log(`[export] Saved ${rows.length} result rows to ${filename}`);
  return filename;
}
