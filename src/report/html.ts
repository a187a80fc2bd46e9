/**
 * HTML helpers shared by the report pages.
 */

import { readFileSync } from "node:fs";

/** Shown wherever a value is missing. */
export const PLACEHOLDER = "—";

/** Plotly bundle loaded by the viewer pages. */
export const PLOTLY_CDN = "https://cdn.plot.ly/plotly-2.27.0.min.js";

const ASSETS_DIR = new URL("../../assets/", import.meta.url);

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export const escapeHtml = (input: string): string =>
  input.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);

/**
 * JSON for an inline <script>. `<` is escaped so embedded text cannot close
 * the script element.
 */
export const serializeForScript = (value: unknown): string =>
  JSON.stringify(value)
    .replace(/</g, "\\u003c")
    .replace(/\u2028/g, "\\u2028")
    .replace(/\u2029/g, "\\u2029");

/**
 * Display form of a measured value: exponent notation for very small or
 * very large magnitudes, six significant digits otherwise.
 */
export const formatNumber = (value: number | null | undefined): string => {
  if (value === null || value === undefined) return PLACEHOLDER;
  if (!Number.isFinite(value)) return String(value);
  if (value === 0) return "0";

  const abs = Math.abs(value);
  if (abs < 1e-3 || abs >= 1e6) {
    return value.toExponential(4);
  }
  return String(Number(value.toPrecision(6)));
};

/**
 * Cell text for a value that may be numeric, raw text, or missing.
 */
export const formatCell = (value: number | string | null | undefined): string =>
  typeof value === "string" ? value : formatNumber(value);

const assetCache = new Map<string, string>();

/**
 * Read a static asset (CSS or browser script) shipped in assets/.
 */
export const readAsset = (name: string): string => {
  let content = assetCache.get(name);
  if (content === undefined) {
    content = readFileSync(new URL(name, ASSETS_DIR), "utf-8");
    assetCache.set(name, content);
  }
  return content;
};

export interface PageOptions {
  title: string;
  styles: string[];
  body: string;
  /** Globals assigned before the page scripts run */
  data: Record<string, unknown>;
  scripts: string[];
  externalScripts?: string[];
}

/**
 * Assemble a self-contained page: assets are inlined, data is embedded as JSON.
 */
export const renderPage = (options: PageOptions): string => {
  const styles = options.styles.map(readAsset).join("\n");
  const external = (options.externalScripts ?? [])
    .map((src) => `<script src="${escapeHtml(src)}"></script>`)
    .join("\n");
  const data = Object.entries(options.data)
    .map(([name, value]) => `const ${name} = ${serializeForScript(value)};`)
    .join("\n");
  const scripts = options.scripts.map(readAsset).join("\n");

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>${escapeHtml(options.title)}</title>
${external}
<style>
${styles}
</style>
</head>
<body>
${options.body}
<script>
${data}
${scripts}
</script>
</body>
</html>
`;
};
