/**
 * Lot index page: summary, parameter statistics, cross-die pivot table,
 * wafer map and navigation to the MDM viewer pages.
 */

import path from "path";
import type { MdmTree } from "../parsers/mdm/discovery.js";
import type {
  MeasurementsPivot,
  ParameterStatistics,
  TemperatureSummary,
  WaferSummary,
} from "../types.js";
import { PLACEHOLDER, escapeHtml, formatCell, formatNumber, renderPage } from "./html.js";

export interface LotReportInput {
  lotName: string;
  headerInfo: Record<string, string>;
  measConditions: Record<string, string>;
  waferSummary: WaferSummary[];
  temperatureSummary: TemperatureSummary[];
  totalDies: number;
  statistics: Record<string, ParameterStatistics>;
  pivot: MeasurementsPivot;
  /** Pre-rendered navigation tree */
  navigation: string;
  mdmFileCount: number;
  generatedAt: Date;
}

export interface DieCoordinate {
  x: number;
  y: number;
}

const DIE_LABEL = /X(-?\d+)-Y(-?\d+)/;

/**
 * Grid position of a die label such as "X-1-Y2".
 */
export const parseDieLabel = (die: string): DieCoordinate | null => {
  const match = DIE_LABEL.exec(die);
  if (!match) return null;
  return { x: Number.parseInt(match[1], 10), y: Number.parseInt(match[2], 10) };
};

/**
 * Short name of a measurement group: the part after the last `~`.
 */
export const shortGroupName = (group: string): string =>
  group.includes("~") ? group.slice(group.lastIndexOf("~") + 1) : group;

const toHref = (from: string, to: string): string =>
  path.relative(from, to).split(path.sep).map(encodeURIComponent).join("/");

const sortedEntries = <V>(map: ReadonlyMap<string, V>): Array<[string, V]> =>
  [...map.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

const navSection = (label: string, children: string, collapsed: boolean): string =>
  `<details class="nav-section"${collapsed ? "" : " open"}><summary class="nav-section-header">${escapeHtml(
    label,
  )}</summary><div class="nav-children">${children}</div></details>`;

const renderGroupLinks = (
  group: string,
  files: readonly string[],
  htmlPaths: ReadonlyMap<string, string>,
  reportDir: string,
): string => {
  const links = [...files]
    .sort((a, b) => path.basename(a).localeCompare(path.basename(b)))
    .flatMap((file) => {
      const htmlPath = htmlPaths.get(file);
      if (!htmlPath) return [];
      const name = path.basename(htmlPath, ".html");
      return [
        `<a class="nav-item" href="${escapeHtml(toHref(reportDir, htmlPath))}" target="_blank">${escapeHtml(name)}</a>`,
      ];
    })
    .join("");
  return `<div class="nav-label">${escapeHtml(shortGroupName(group))}</div>${links}`;
};

/**
 * Navigation tree: wafer > temperature > die > measurement group > page.
 * Only files with a generated page get a link.
 */
export const buildNavigationTree = (
  tree: MdmTree,
  htmlPaths: ReadonlyMap<string, string>,
  reportDir: string,
): string =>
  sortedEntries(tree)
    .map(([wafer, temps]) => {
      const tempsHtml = sortedEntries(temps)
        .map(([temp, dies]) => {
          const diesHtml = sortedEntries(dies)
            .map(([die, groups]) => {
              const groupsHtml = sortedEntries(groups)
                .map(([group, files]) => renderGroupLinks(group, files, htmlPaths, reportDir))
                .join("");
              return navSection(die, groupsHtml, true);
            })
            .join("");
          return navSection(temp, diesHtml, true);
        })
        .join("");
      return navSection(wafer, tempsHtml, false);
    })
    .join("\n");

const card = (label: string, value: string, detail?: string): string =>
  `<div class="summary-card"><span class="summary-label">${escapeHtml(label)}</span><span class="summary-value">${escapeHtml(
    value,
  )}${detail ? ` <span class="summary-detail">(${escapeHtml(detail)})</span>` : ""}</span></div>`;

const renderKeyValues = (entries: Record<string, string>): string =>
  Object.entries(entries)
    .map(
      ([key, value]) =>
        `<div class="metadata-item"><span class="metadata-label">${escapeHtml(
          key,
        )}:</span><span class="metadata-value">${escapeHtml(value)}</span></div>`,
    )
    .join("\n");

const renderStatisticsTable = (statistics: Record<string, ParameterStatistics>): string => {
  const rows = Object.entries(statistics)
    .map(
      ([name, s]) =>
        `<tr><td class="mono">${escapeHtml(name)}</td><td>${s.count}</td><td>${formatNumber(
          s.mean,
        )}</td><td>${formatNumber(s.std)}</td><td>${formatNumber(s.min)}</td><td>${formatNumber(
          s.max,
        )}</td><td>${formatNumber(s.median)}</td><td>${s.cv.toFixed(2)}%</td></tr>`,
    )
    .join("\n");
  return `<table class="data-table" id="statistics-table"><thead><tr><th>Parameter</th><th>Count</th><th>Mean</th><th>Std</th><th>Min</th><th>Max</th><th>Median</th><th>CV</th></tr></thead><tbody>${rows}</tbody></table>`;
};

const STAT_COLUMNS = [
  ["Min", "min"],
  ["Max", "max"],
  ["Average", "average"],
  ["Median", "median"],
  ["StdDev", "stdDev"],
] as const;

/**
 * Pivot table rows. Dies without a value show the placeholder.
 */
export const renderPivotTable = (pivot: MeasurementsPivot): string => {
  const head = `<tr><th>Wafer</th><th>Temperature</th><th>Device</th><th>Parameter</th>${STAT_COLUMNS.map(
    ([label]) => `<th>${label}</th>`,
  ).join("")}${pivot.dies.map((die) => `<th class="die-col">${escapeHtml(die)}</th>`).join("")}</tr>`;

  const body = pivot.rows
    .map((row) => {
      const stats = STAT_COLUMNS.map(
        ([, key]) => `<td class="stat-col">${formatNumber(row.stats[key])}</td>`,
      ).join("");
      const dies = pivot.dies
        .map((die) => {
          const value = row.values[die];
          return `<td>${value === undefined ? PLACEHOLDER : escapeHtml(formatCell(value))}</td>`;
        })
        .join("");
      return `<tr data-wafer="${escapeHtml(row.wafer)}" data-temperature="${escapeHtml(
        row.temperature,
      )}" data-device="${escapeHtml(row.device)}" data-parameter="${escapeHtml(
        row.parameter,
      )}"><td class="mono">${escapeHtml(row.wafer)}</td><td>${escapeHtml(
        row.temperature,
      )}</td><td>${escapeHtml(row.device)}</td><td class="mono">${escapeHtml(
        row.parameter,
      )}</td>${stats}${dies}</tr>`;
    })
    .join("\n");

  return `<table class="data-table" id="measurements-table"><thead>${head}</thead><tbody id="measurements-body">${body}</tbody></table>`;
};

const unique = (values: string[]): string[] => [...new Set(values)].sort();

const filterDropdown = (kind: string, label: string, values: string[]): string =>
  `<div class="filter-group"><button class="filter-btn" data-filter="${kind}">${escapeHtml(
    label,
  )} ▼</button><div class="filter-dropdown" id="filter-${kind}-dropdown">${values
    .map(
      (value) =>
        `<label class="checkbox-item"><input type="checkbox" value="${escapeHtml(
          value,
        )}"><span>${escapeHtml(value)}</span></label>`,
    )
    .join("")}</div></div>`;

const selectOptions = (values: string[], placeholder?: string): string =>
  [
    ...(placeholder === undefined ? [] : [`<option value="">${escapeHtml(placeholder)}</option>`]),
    ...values.map((v) => `<option value="${escapeHtml(v)}">${escapeHtml(v)}</option>`),
  ].join("");

/**
 * Render the lot index page.
 */
export const renderLotReport = (input: LotReportInput): string => {
  const { pivot } = input;
  const wafers = unique(pivot.rows.map((row) => row.wafer));
  const temperatures = unique(pivot.rows.map((row) => row.temperature));
  const devices = unique(pivot.rows.map((row) => row.device));
  const parameters = unique(pivot.rows.map((row) => row.parameter));
  const measCondition = input.headerInfo["Meas Condition"] ?? "";

  const dieCoordinates: Record<string, DieCoordinate> = {};
  for (const die of pivot.dies) {
    const coord = parseDieLabel(die);
    if (coord) dieCoordinates[die] = coord;
  }

  const body = `<div class="layout">
<nav class="sidebar"><h2 class="sidebar-title">MDM Files</h2>${input.navigation || `<p class="muted">No MDM files found</p>`}</nav>
<main class="container">
<header><h1>${escapeHtml(input.lotName)}</h1>${measCondition ? `<p class="subtitle">${escapeHtml(measCondition)}</p>` : ""}</header>
<section class="summary-grid">
${card("Wafers", String(input.waferSummary.length), input.waferSummary.map((w) => w.wafer).join(", "))}
${card("Dies", String(input.totalDies))}
${card("Temperatures", String(input.temperatureSummary.length), input.temperatureSummary.map((t) => `${t.temperature}°C`).join(", "))}
${card("Parameters", String(Object.keys(input.statistics).length))}
${card("MDM Files", String(input.mdmFileCount))}
</section>
<section class="card"><h2 class="card-title">LOT INFO</h2><div class="metadata-grid">${renderKeyValues(input.headerInfo)}</div>
${Object.keys(input.measConditions).length > 0 ? `<h3 class="card-subtitle">Measurement Conditions</h3><div class="metadata-grid">${renderKeyValues(input.measConditions)}</div>` : ""}</section>
<section class="card"><h2 class="card-title">PARAMETER STATISTICS</h2><div class="table-container">${renderStatisticsTable(input.statistics)}</div></section>
<section class="card"><div class="table-header"><h2 class="card-title">MEASUREMENTS</h2>
<div class="filters">${filterDropdown("wafer", "Wafer", wafers)}${filterDropdown("temperature", "Temperature", temperatures)}${filterDropdown("device", "Device", devices)}${filterDropdown("parameter", "Parameter", parameters)}
<button class="action-btn" id="clear-filters-btn">Clear</button><button class="action-btn" id="copy-measurements-btn">Copy Data</button></div></div>
<div class="table-container">${renderPivotTable(pivot)}</div></section>
<section class="card"><h2 class="card-title">WAFER MAP</h2>
<div class="graph-controls">
<div class="control-group"><span class="control-label">Wafer</span><select id="wafer-map-wafer-select">${selectOptions(wafers)}</select></div>
<div class="control-group"><span class="control-label">Temperature</span><select id="wafer-map-temperature-select">${selectOptions(temperatures, "All")}</select></div>
<div class="control-group"><span class="control-label">Device</span><select id="wafer-map-device-select">${selectOptions(devices, "All")}</select></div>
<div class="control-group"><span class="control-label">Parameter</span><select id="wafer-map-parameter-select">${selectOptions(parameters)}</select></div>
<label class="checkbox-item"><input type="checkbox" id="wafer-map-heatmap-toggle" checked><span>Heat map</span></label>
</div>
<div class="wafer-map-legend" id="wafer-map-legend"><span id="wafer-map-legend-min-value"></span><span class="legend-bar"></span><span id="wafer-map-legend-max-value"></span></div>
<svg id="wafer-map-svg" width="800" height="600"></svg>
</section>
<footer><p>Report generated on ${escapeHtml(input.generatedAt.toISOString().replace("T", " ").slice(0, 19))}</p></footer>
</main>
</div>`;

  return renderPage({
    title: `${input.lotName} - Measurement Report`,
    styles: ["base.css", "lot-report.css"],
    body,
    data: {
      PIVOT_ROWS: pivot.rows.map((row) => ({
        wafer: row.wafer,
        temperature: row.temperature,
        device: row.device,
        parameter: row.parameter,
        values: row.values,
      })),
      DIE_COORDINATES: dieCoordinates,
    },
    scripts: ["common.js", "lot-report.js"],
  });
};
