/**
 * CLI command handlers.
 */

import { BINARY_NAME, VERSION } from "../version.js";
import { describeMdm, generateLotReport, generateMdmViewer } from "../service.js";
import { isErrorResult } from "../types.js";
import { openInBrowser } from "./browser.js";
import { NO_OPEN_ENV } from "./options.js";

/**
 * Print version information.
 */
export const printVersion = (): void => {
  console.log(`${BINARY_NAME} v${VERSION}`);
};

/**
 * Print help message.
 */
export const printHelp = (): void => {
  console.log(
    `
${BINARY_NAME} v${VERSION}

Static HTML reports for wafer-level measurement data (WPro CSV and MDM files).

USAGE:
  ${BINARY_NAME} <WPro.csv> [OPTIONS]
  ${BINARY_NAME} <file.mdm> [--out <file.html>] [OPTIONS]
  ${BINARY_NAME} --json <file.mdm> [--block <n>]

OPTIONS:
  --mdm <file>     Render the viewer page of a single MDM file (implied
                   for a path ending in .mdm)
  --out <file>     Output path for --mdm (default: input with .html)
  --json           Print a parsed MDM file as JSON
  --block <n>      With --json, only the block of region n (0-based)
  --no-open        Do not open the result in the browser
  --version, -v    Print version and exit
  --help, -h       Show this help message

ENVIRONMENT:
  ${NO_OPEN_ENV}=1    Never open the browser
`.trim(),
  );
};

/**
 * Build the lot report for a WPro CSV file.
 * @returns Process exit code
 */
export const handleReportCommand = async (
  csvPath: string,
  autoOpen: boolean,
): Promise<number> => {
  const result = await generateLotReport(csvPath, {
    onComplete: autoOpen ? openInBrowser : undefined,
  });

  if (isErrorResult(result)) {
    console.error(`Error: ${result.error}`);
    return 1;
  }
  return 0;
};

/**
 * Render the viewer page for one MDM file.
 * @returns Process exit code
 */
export const handleMdmCommand = async (
  mdmPath: string,
  outputPath: string | undefined,
  autoOpen: boolean,
): Promise<number> => {
  const result = await generateMdmViewer(mdmPath, { outputPath });

  if (isErrorResult(result)) {
    console.error(`Error: ${result.error}`);
    return 1;
  }

  console.log(`HTML viewer generated: ${result}`);
  if (autoOpen) {
    openInBrowser(result);
  }
  return 0;
};

/**
 * Print the parsed MDM file, or one of its blocks, as JSON.
 * @returns Process exit code
 */
export const handleJsonCommand = async (
  mdmPath: string,
  blockIndex: number | undefined,
): Promise<number> => {
  const result = await describeMdm(mdmPath, blockIndex);

  if (isErrorResult(result)) {
    console.error(`Error: ${result.error}`);
    return 1;
  }

  console.log(JSON.stringify(result, null, 2));
  return 0;
};
