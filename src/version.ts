/**
 * Version information for wafer-report.
 */

import { createRequire } from "node:module";

/** Current version, read from package.json. */
export const VERSION = (() => {
  try {
    const require = createRequire(import.meta.url);
    const pkg: { version?: unknown } = require("../package.json");
    return typeof pkg.version === "string" ? pkg.version : "0.0.0-dev";
  } catch {
    return "0.0.0-dev";
  }
})();

/** Name of the installed command. */
export const BINARY_NAME = "wafer-report";
