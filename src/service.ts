/**
 * Report Service
 *
 * Drives discovery, parsing and rendering. Methods take file paths, write
 * HTML next to (or under) the inputs and return the written path or an
 * ErrorResult.
 */

import { existsSync } from "fs";
import { mkdir, readFile, writeFile } from "fs/promises";
import path from "path";
import {
  countMdmBlocks,
  findMdmFiles,
  getLotName,
  getMdmBlock,
  getReportPath,
  getResultColumns,
  getUniqueDies,
  loadWpro,
  organizeMdmFiles,
  parseMdm,
  parseMdmContent,
  REPORT_DIR_NAME,
} from "./parsers/index.js";
import { renderMdmViewer } from "./report/mdm-viewer.js";
import { buildNavigationTree, renderLotReport } from "./report/lot-report.js";
import {
  buildMeasurementsPivot,
  computeParameterStatistics,
  summarizeTemperatures,
  summarizeWafers,
} from "./wafer-statistics.js";
import {
  errorMessage,
  type ErrorResult,
  type ParsedMdm,
} from "./types.js";

// =============================================================================
// Path Normalization
// =============================================================================

/**
 * Normalize a file path to use native separators.
 * On Unix, backslashes are converted too since Windows-style paths are often
 * pasted regardless of platform.
 */
export const normalizePath = (inputPath: string): string => {
  if (process.platform === "win32") {
    return path.normalize(inputPath);
  }
  return path.normalize(inputPath.replace(/\\/g, "/"));
};

const writeHtml = async (outputPath: string, html: string): Promise<void> => {
  await mkdir(path.dirname(outputPath), { recursive: true });
  await writeFile(outputPath, html, "utf-8");
};

// =============================================================================
// MDM Viewer
// =============================================================================

export interface MdmViewerOptions {
  /** Defaults to the input path with an .html extension */
  outputPath?: string;
}

/**
 * Render the viewer page of one MDM file.
 * A file without data blocks is an error.
 */
export const generateMdmViewer = async (
  mdmPath: string,
  options: MdmViewerOptions = {},
): Promise<string | ErrorResult> => {
  const normalizedPath = normalizePath(mdmPath);
  const parsed = path.parse(normalizedPath);
  const outputPath = options.outputPath
    ? normalizePath(options.outputPath)
    : path.join(parsed.dir, `${parsed.name}.html`);

  try {
    const mdm = await parseMdm(normalizedPath);
    if (mdm.blocks.length === 0) {
      return { error: `${normalizedPath}: No data blocks found in MDM file` };
    }
    await writeHtml(outputPath, renderMdmViewer(mdm, parsed.base));
    return outputPath;
  } catch (error) {
    return { error: errorMessage(error) };
  }
};

/**
 * Render one viewer per MDM file under the report folder, mirroring the lot
 * layout. Files that fail are logged and left out of the result.
 *
 * @returns Map from MDM path to written HTML path
 */
export const generateMdmViewers = async (
  mdmFiles: readonly string[],
  lotDir: string,
  reportDir: string,
): Promise<Map<string, string>> => {
  const htmlPaths = new Map<string, string>();

  for (const mdmPath of mdmFiles) {
    const relative = path.relative(lotDir, mdmPath);
    const result = await generateMdmViewer(mdmPath, {
      outputPath: getReportPath(mdmPath, lotDir, reportDir),
    });

    if (typeof result === "string") {
      htmlPaths.set(mdmPath, result);
      console.log(`  Generated: ${path.relative(reportDir, result)}`);
    } else {
      console.error(`  Error generating ${relative}: ${result.error}`);
    }
  }

  return htmlPaths;
};

// =============================================================================
// MDM Inspection
// =============================================================================

export interface MdmDescription extends ParsedMdm {
  /** BEGIN_DB/END_DB regions in the file, empty ones included */
  regionCount: number;
}

/**
 * Parsed MDM file as plain data, optionally narrowed to the block of one
 * region. An out-of-range index is an error; an empty region yields no blocks.
 */
export const describeMdm = async (
  mdmPath: string,
  blockIndex?: number,
): Promise<MdmDescription | ErrorResult> => {
  const normalizedPath = normalizePath(mdmPath);
  try {
    const content = await readFile(normalizedPath, "utf-8");
    const parsed = parseMdmContent(content);
    const regionCount = countMdmBlocks(content);
    if (blockIndex === undefined) {
      return { ...parsed, regionCount };
    }
    const block = getMdmBlock(content, blockIndex);
    return { ...parsed, regionCount, blocks: block ? [block] : [] };
  } catch (error) {
    return { error: `${normalizedPath}: ${errorMessage(error)}` };
  }
};

// =============================================================================
// Lot Report
// =============================================================================

/**
 * Folder holding the lot's measurement tree: the CSV's own folder when it is
 * named after the lot, otherwise a sibling folder named after the lot when
 * one exists, otherwise the CSV's folder.
 */
export const resolveLotFolder = (csvPath: string, lotName: string): string => {
  const csvDir = path.dirname(csvPath);
  if (path.basename(csvDir) === lotName) {
    return csvDir;
  }
  const candidate = path.join(csvDir, lotName);
  return existsSync(candidate) ? candidate : csvDir;
};

export interface LotReportOptions {
  /** Called with the written index path */
  onComplete?: (indexPath: string) => void;
  now?: () => Date;
}

/**
 * Build the complete lot report from a WPro CSV file: one viewer per MDM file
 * in the lot folder and an index page at Report/index.html.
 *
 * @returns Path of the written index page
 */
export const generateLotReport = async (
  csvPath: string,
  options: LotReportOptions = {},
): Promise<string | ErrorResult> => {
  const normalizedPath = normalizePath(csvPath);
  console.log(`Processing: ${path.basename(normalizedPath)}`);

  try {
    const table = await loadWpro(normalizedPath);
    const lotName = getLotName(table);
    console.log(`Lot: ${lotName}`);

    const lotDir = resolveLotFolder(normalizedPath, lotName);
    const reportDir = path.join(lotDir, REPORT_DIR_NAME);
    await mkdir(reportDir, { recursive: true });
    console.log(`Lot folder: ${lotDir}`);
    console.log(`Report folder: ${reportDir}`);

    console.log("Finding MDM files...");
    const mdmFiles = await findMdmFiles(lotDir);
    console.log(`Found ${mdmFiles.length} MDM files`);

    console.log("Generating HTML pages for MDM files...");
    const htmlPaths = await generateMdmViewers(mdmFiles, lotDir, reportDir);
    console.log(`Generated ${htmlPaths.size} HTML pages`);

    console.log("Generating main report...");
    const resultColumns = getResultColumns(table.columns);
    const html = renderLotReport({
      lotName,
      headerInfo: table.headerInfo,
      measConditions: table.measConditions,
      waferSummary: summarizeWafers(table),
      temperatureSummary: summarizeTemperatures(table),
      totalDies: getUniqueDies(table).length,
      statistics: computeParameterStatistics(table, resultColumns),
      pivot: buildMeasurementsPivot(table, resultColumns),
      navigation: buildNavigationTree(
        organizeMdmFiles(mdmFiles, lotDir),
        htmlPaths,
        reportDir,
      ),
      mdmFileCount: mdmFiles.length,
      generatedAt: (options.now ?? (() => new Date()))(),
    });

    const indexPath = path.join(reportDir, "index.html");
    await writeHtml(indexPath, html);
    console.log(`Main report: ${indexPath}`);

    options.onComplete?.(indexPath);
    return indexPath;
  } catch (error) {
    return { error: errorMessage(error) };
  }
};
