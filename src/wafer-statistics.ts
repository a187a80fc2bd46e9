/**
 * Wafer Statistics
 *
 * Aggregations over a WPro table: flat per-parameter statistics for a quick
 * view of the whole lot, and a (wafer, temperature, device, parameter) pivot
 * with one column per die for spotting outlier dies.
 */

import {
  coerceNumber,
  coerceNumericValues,
  max,
  mean,
  median,
  min,
  populationStdDev,
  sampleStdDev,
} from "./numeric.js";
import {
  WPRO_COLUMNS,
  type MeasurementsPivot,
  type ParameterStatistics,
  type PivotRow,
  type PivotStatistics,
  type TemperatureSummary,
  type WaferSummary,
  type WproTable,
} from "./types.js";

// =============================================================================
// Flat Statistics
// =============================================================================

/**
 * Statistics for one sample. Undefined for an empty sample.
 */
export const describeSample = (
  values: readonly number[],
): ParameterStatistics | undefined => {
  if (values.length === 0) {
    return undefined;
  }

  const avg = mean(values);
  const std = sampleStdDev(values);
  return {
    count: values.length,
    mean: avg,
    std,
    min: min(values),
    max: max(values),
    median: median(values),
    cv: avg === 0 ? 0 : (std / avg) * 100,
  };
};

/**
 * Per-parameter statistics over every row. Parameters without a single
 * numeric cell are left out.
 */
export const computeParameterStatistics = (
  table: WproTable,
  resultColumns: readonly string[],
): Record<string, ParameterStatistics> => {
  const stats: Record<string, ParameterStatistics> = {};

  for (const column of resultColumns) {
    if (!table.columns.includes(column)) continue;

    const sample = coerceNumericValues(table.rows.map((row) => row[column]));
    const described = describeSample(sample);
    if (described) {
      stats[column] = described;
    }
  }

  return stats;
};

// =============================================================================
// Pivot
// =============================================================================

const EMPTY_PIVOT_STATISTICS: PivotStatistics = {
  min: null,
  max: null,
  average: null,
  median: null,
  stdDev: null,
};

/**
 * Five-number summary over the numeric die values of a pivot row.
 */
export const computePivotStatistics = (
  values: Record<string, number | string>,
): PivotStatistics => {
  const numeric = coerceNumericValues(Object.values(values));
  if (numeric.length === 0) {
    return { ...EMPTY_PIVOT_STATISTICS };
  }
  return {
    min: min(numeric),
    max: max(numeric),
    average: mean(numeric),
    median: median(numeric),
    stdDev: populationStdDev(numeric),
  };
};

/**
 * Sorted set of every die in the table.
 */
export const collectDies = (table: WproTable): string[] =>
  [...new Set(table.rows.map((row) => row[WPRO_COLUMNS.die] ?? ""))].sort();

/**
 * Canonical text of a temperature cell: numeric values in their shortest
 * form, so `25` and `25.0` group together. Other text is kept as is.
 */
export const normalizeTemperature = (value: string): string => {
  const numeric = coerceNumber(value);
  return numeric === undefined ? value : String(numeric);
};

const temperatureOf = (row: WproTable["rows"][number]): string =>
  normalizeTemperature(row[WPRO_COLUMNS.temperature] ?? "");

const pivotKey = (...parts: string[]): string => JSON.stringify(parts);

/**
 * Build the measurements pivot.
 *
 * Rows are keyed by (wafer, normalized temperature, device name, parameter)
 * in first-seen order. A later value for the same die replaces the earlier one.
 * Blank cells are skipped; non-numeric cells are kept for display but do not
 * count towards the statistics.
 */
export const buildMeasurementsPivot = (
  table: WproTable,
  resultColumns: readonly string[],
): MeasurementsPivot => {
  const rowsByKey = new Map<string, Omit<PivotRow, "stats">>();

  for (const row of table.rows) {
    const wafer = row[WPRO_COLUMNS.wafer] ?? "";
    const temperature = temperatureOf(row);
    const die = row[WPRO_COLUMNS.die] ?? "";
    const device = row[WPRO_COLUMNS.name] ?? "";

    for (const parameter of resultColumns) {
      const cell = row[parameter];
      if (cell === undefined || cell.trim() === "") continue;

      const key = pivotKey(wafer, temperature, device, parameter);
      let pivotRow = rowsByKey.get(key);
      if (!pivotRow) {
        pivotRow = { wafer, temperature, device, parameter, values: {} };
        rowsByKey.set(key, pivotRow);
      }
      pivotRow.values[die] = coerceNumber(cell) ?? cell;
    }
  }

  const rows = Array.from(rowsByKey.values(), (row) => ({
    ...row,
    stats: computePivotStatistics(row.values),
  }));

  return { dies: collectDies(table), rows };
};

// =============================================================================
// Summaries
// =============================================================================

/**
 * Compare temperatures numerically when both parse, otherwise as text.
 */
export const compareTemperatures = (a: string, b: string): number => {
  const na = coerceNumber(a);
  const nb = coerceNumber(b);
  if (na !== undefined && nb !== undefined) {
    return na - nb;
  }
  return a < b ? -1 : a > b ? 1 : 0;
};

const uniqueOf = (rows: WproTable["rows"], column: string): string[] =>
  [...new Set(rows.map((row) => row[column] ?? ""))];

/**
 * Per-wafer overview in first-seen wafer order.
 */
export const summarizeWafers = (table: WproTable): WaferSummary[] =>
  uniqueOf(table.rows, WPRO_COLUMNS.wafer).map((wafer) => {
    const rows = table.rows.filter((row) => (row[WPRO_COLUMNS.wafer] ?? "") === wafer);
    return {
      wafer,
      dieCount: uniqueOf(rows, WPRO_COLUMNS.die).length,
      temperatures: [...new Set(rows.map(temperatureOf))].sort(compareTemperatures),
      blocks: uniqueOf(rows, WPRO_COLUMNS.block),
      subsites: uniqueOf(rows, WPRO_COLUMNS.subsite),
    };
  });

/**
 * Distinct die count per temperature, temperatures ascending.
 */
export const summarizeTemperatures = (table: WproTable): TemperatureSummary[] =>
  [...new Set(table.rows.map(temperatureOf))]
    .sort(compareTemperatures)
    .map((temperature) => ({
      temperature,
      dieCount: uniqueOf(
        table.rows.filter((row) => temperatureOf(row) === temperature),
        WPRO_COLUMNS.die,
      ).length,
    }));
