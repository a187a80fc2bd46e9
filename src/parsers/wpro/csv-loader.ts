/**
 * Loader for WPro (WaferPro) CSV result files.
 * Skips the `*` preamble and reads the remaining rows as a CSV table.
 */

import { readFile } from "fs/promises";
import { parse } from "csv-parse/sync";
import { parseWproPreamble } from "./preamble-parser.js";
import { uniqueColumnNames } from "../columns.js";
import {
  RESULT_END_SENTINEL,
  RESULT_START_SENTINEL,
  WPRO_COLUMNS,
  type WproRow,
  type WproTable,
} from "../../types.js";

export interface SplitWproContent {
  preamble: string[];
  body: string;
}

/**
 * Split content at the first non-blank line that does not start with `*`.
 * Throws when there is no such line.
 */
export const splitPreamble = (content: string): SplitWproContent => {
  const lines = content.split(/\r?\n/);
  const start = lines.findIndex((line) => {
    const trimmed = line.trim();
    return trimmed !== "" && !trimmed.startsWith("*");
  });

  if (start === -1) {
    throw new Error("WPro file has no header row: every line is a comment or blank");
  }

  return {
    preamble: lines.slice(0, start).filter((line) => line.trim().startsWith("*")),
    body: lines.slice(start).join("\n"),
  };
};

/**
 * Parse WPro CSV content (pure function for testing).
 * Repeated header names are numbered (`P`, `P.1`) so no column is lost.
 */
export const parseWproContent = (content: string): WproTable => {
  const { preamble, body } = splitPreamble(content);
  const records: string[][] = parse(body, {
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
    relax_quotes: true,
    trim: true,
  });

  const [header = [], ...dataRecords] = records;
  const columns = uniqueColumnNames(header);
  const rows = dataRecords.map(
    (record): WproRow => Object.fromEntries(columns.map((column, i) => [column, record[i] ?? ""])),
  );

  return { columns, rows, ...parseWproPreamble(preamble) };
};

/**
 * Load a WPro CSV file from disk.
 */
export const loadWpro = async (filePath: string): Promise<WproTable> => {
  const content = await readFile(filePath, "utf-8");
  try {
    return parseWproContent(content);
  } catch (error) {
    throw new Error(
      `${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }
};

/**
 * Unique values of a column in first-encountered order.
 * Returns an empty list for an unknown column.
 */
export const getUniqueValues = (table: WproTable, column: string): string[] => {
  if (!table.columns.includes(column)) {
    return [];
  }
  return [...new Set(table.rows.map((row) => row[column] ?? ""))];
};

export const getUniqueWafers = (table: WproTable): string[] =>
  getUniqueValues(table, WPRO_COLUMNS.wafer);

export const getUniqueDies = (table: WproTable): string[] =>
  getUniqueValues(table, WPRO_COLUMNS.die);

export const getUniqueTemperatures = (table: WproTable): string[] =>
  getUniqueValues(table, WPRO_COLUMNS.temperature);

export const getUniqueBlocks = (table: WproTable): string[] =>
  getUniqueValues(table, WPRO_COLUMNS.block);

export const getUniqueSubsites = (table: WproTable): string[] =>
  getUniqueValues(table, WPRO_COLUMNS.subsite);

export const getUniqueNames = (table: WproTable): string[] =>
  getUniqueValues(table, WPRO_COLUMNS.name);

/**
 * Measurement result columns: strictly between the first `$` and the first
 * `ResultRead` column. Empty when either sentinel is missing.
 */
export const getResultColumns = (columns: readonly string[]): string[] => {
  const start = columns.indexOf(RESULT_START_SENTINEL);
  const end = columns.indexOf(RESULT_END_SENTINEL);
  if (start === -1 || end === -1 || end <= start) {
    return [];
  }
  return columns.slice(start + 1, end);
};

/**
 * Lot name from the preamble, or "Unknown".
 */
export const getLotName = (table: WproTable): string =>
  table.headerInfo["Lot"] ?? "Unknown";
