/**
 * Measurement File Formats
 *
 * Entry point for both parsers. MDM files are per-device sweep exports,
 * WPro CSV files are the lot-level result tables that reference them.
 */

import path from "path";
import { isMdmFile } from "./mdm/discovery.js";

export * from "./mdm/index.js";
export * from "./wpro/csv-loader.js";
export { parseWproPreamble, type WproPreamble } from "./wpro/preamble-parser.js";

export type MeasurementFormat = "mdm" | "wpro";

/**
 * Format of a measurement file, judged by extension.
 */
export const findFormat = (filePath: string): MeasurementFormat | undefined => {
  if (isMdmFile(filePath)) return "mdm";
  if (path.extname(filePath).toLowerCase() === ".csv") return "wpro";
  return undefined;
};
