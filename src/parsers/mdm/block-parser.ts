/**
 * Parser for MDM measurement blocks (BEGIN_DB ... END_DB)
 */

import { parseFloatStrict } from "../../numeric.js";
import type { MeasurementBlock } from "../../types.js";
import { uniqueColumnNames } from "../columns.js";

const BEGIN_MARKER = "BEGIN_DB";
const END_MARKER = "END_DB";
const VAR_PREFIX = "ICCAP_VAR";

/**
 * Split content into the bodies of its BEGIN_DB/END_DB regions.
 * Markers must sit on their own line. A BEGIN_DB inside an open region is
 * treated as content, and a region still open at end of input is dropped.
 */
export const scanBlockRegions = (content: string): string[][] => {
  const regions: string[][] = [];
  let current: string[] | null = null;

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (current === null) {
      if (line === BEGIN_MARKER) {
        current = [];
      }
      continue;
    }
    if (line === END_MARKER) {
      regions.push(current);
      current = null;
      continue;
    }
    current.push(line);
  }

  return regions;
};

const isDataLineStart = (line: string): boolean => {
  const first = line[0];
  return first === "-" || (first >= "0" && first <= "9");
};

/**
 * Parse a data line against the column list. Returns null when the field
 * count differs or any field is not a float.
 */
const parseDataRow = (
  line: string,
  columns: readonly string[],
): Record<string, number> | null => {
  const fields = line.split(/\s+/);
  if (fields.length !== columns.length) {
    return null;
  }

  const entries: Array<[string, number]> = [];
  for (let i = 0; i < columns.length; i++) {
    const value = parseFloatStrict(fields[i]);
    if (value === undefined) {
      return null;
    }
    entries.push([columns[i], value]);
  }
  // fromEntries defines own keys, so a "__proto__" column stays a column
  return Object.fromEntries(entries);
};

/**
 * Parse the lines of one region. Returns null if the region never declared
 * columns or produced no valid rows.
 *
 * A malformed ICCAP_VAR value throws: condition metadata that cannot be read
 * would mislabel every row of the block.
 */
export const parseBlockRegion = (
  lines: readonly string[],
  index: number,
): MeasurementBlock | null => {
  const vars = new Map<string, number>();
  const rows: Array<Record<string, number>> = [];
  let columns: string[] | null = null;

  for (const rawLine of lines) {
    const line = rawLine.trim();
    if (!line) continue;

    if (line.startsWith(VAR_PREFIX)) {
      const parts = line.split(/\s+/);
      if (parts.length >= 3) {
        const value = parseFloatStrict(parts[2]);
        if (value === undefined) {
          throw new Error(
            `Invalid ICCAP_VAR value '${parts[2]}' for '${parts[1]}' in block ${index}`,
          );
        }
        vars.set(parts[1], value);
      }
    } else if (line.startsWith("#")) {
      columns = uniqueColumnNames(line.slice(1).trim().split(/\s+/).filter(Boolean));
    } else if (columns && columns.length > 0 && isDataLineStart(line)) {
      const row = parseDataRow(line, columns);
      if (row) {
        rows.push(row);
      }
    }
  }

  if (!columns || columns.length === 0 || rows.length === 0) {
    return null;
  }

  return { index, vars: Object.fromEntries(vars), columns, rows };
};

/**
 * Parse every measurement block in MDM content (pure function for testing).
 * Empty regions are skipped but still consume an index.
 */
export const parseMdmBlocksContent = (content: string): MeasurementBlock[] =>
  scanBlockRegions(content)
    .map((lines, index) => parseBlockRegion(lines, index))
    .filter((block): block is MeasurementBlock => block !== null);

/**
 * Number of BEGIN_DB/END_DB regions, empty ones included.
 */
export const countMdmBlocks = (content: string): number =>
  scanBlockRegions(content).length;

/**
 * Get the block of one region by its index.
 * Returns null when that region holds no data.
 */
export const getMdmBlock = (
  content: string,
  blockIndex: number,
): MeasurementBlock | null => {
  const regions = scanBlockRegions(content);
  if (!Number.isInteger(blockIndex) || blockIndex < 0 || blockIndex >= regions.length) {
    throw new RangeError(
      `Block index ${blockIndex} out of range. File has ${regions.length} blocks.`,
    );
  }
  return parseBlockRegion(regions[blockIndex], blockIndex);
};
