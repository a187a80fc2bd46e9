#!/usr/bin/env node

/**
 * wafer-report entry point
 *
 * Run with: npx tsx src/index.ts <WPro.csv>
 * Or after build: node dist/index.js <WPro.csv>
 *
 * See --help for the other commands.
 */

import {
  handleJsonCommand,
  handleMdmCommand,
  handleReportCommand,
  printHelp,
  printVersion,
} from "./cli/commands.js";
import { parseCliOptions } from "./cli/options.js";

const main = async (): Promise<number> => {
  const options = parseCliOptions(process.argv.slice(2));

  switch (options.command) {
    case "version":
      printVersion();
      return 0;
    case "help":
      printHelp();
      return 0;
    case "report":
      return handleReportCommand(options.csvPath, options.autoOpen);
    case "mdm":
      return handleMdmCommand(options.mdmPath, options.outputPath, options.autoOpen);
    case "json":
      return handleJsonCommand(options.mdmPath, options.blockIndex);
  }
};

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error("Error:", error instanceof Error ? error.message : error);
    process.exit(1);
  });
