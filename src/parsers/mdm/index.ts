/**
 * MDM Parser
 * Functions to parse MDM measurement files into ParsedMdm
 */

import { readFile } from "fs/promises";
import { parseMdmHeaderContent } from "./header-parser.js";
import { parseMdmBlocksContent } from "./block-parser.js";
import {
  detectDataType,
  parseInputVariable,
  parseOutputVariable,
  sortInputsBySweepOrder,
} from "./variables.js";
import { errorMessage, type MeasurementBlock, type ParsedMdm } from "../../types.js";

export {
  parseMdmHeaderContent,
  listInputNames,
  listOutputNames,
} from "./header-parser.js";
export {
  scanBlockRegions,
  parseBlockRegion,
  parseMdmBlocksContent,
  countMdmBlocks,
  getMdmBlock,
} from "./block-parser.js";
export {
  parseInputVariable,
  parseOutputVariable,
  sortInputsBySweepOrder,
  sortOutputsByNodeOrder,
  orderColumnsBySweep,
  detectDataType,
  nodeLabel,
} from "./variables.js";
export {
  findMdmFiles,
  getReportPath,
  organizeMdmFiles,
  isMdmFile,
  MDM_EXTENSIONS,
  REPORT_DIR_NAME,
  type MdmTree,
} from "./discovery.js";

/**
 * Parse MDM file content (pure function for testing).
 * Inputs come back sorted by sweep order.
 */
export const parseMdmContent = (content: string): ParsedMdm => {
  const header = parseMdmHeaderContent(content);
  const inputs = sortInputsBySweepOrder(header.inputs.map(parseInputVariable));

  return {
    header,
    inputs,
    outputs: header.outputs.map(parseOutputVariable),
    blocks: parseMdmBlocksContent(content),
    dataType: detectDataType(inputs),
  };
};

/**
 * Parse an MDM file from disk.
 * Format errors are rethrown with the file path attached.
 */
export const parseMdm = async (filePath: string): Promise<ParsedMdm> => {
  const content = await readFile(filePath, "utf-8");
  try {
    return parseMdmContent(content);
  } catch (error) {
    throw new Error(`${filePath}: ${errorMessage(error)}`, { cause: error });
  }
};

/**
 * Flatten blocks into one record per data row, with each block's ICCAP_VAR
 * conditions added as extra columns.
 */
export const flattenMdmBlocks = (
  blocks: readonly MeasurementBlock[],
): Array<Record<string, number>> =>
  blocks.flatMap((block) => block.rows.map((row) => ({ ...row, ...block.vars })));
