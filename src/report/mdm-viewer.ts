/**
 * MDM viewer page: header tables, interactive plot and the data table of one
 * MDM file.
 */

import {
  nodeLabel,
  orderColumnsBySweep,
  sortOutputsByNodeOrder,
} from "../parsers/mdm/variables.js";
import type { InputVariable, MeasurementBlock, ParsedMdm } from "../types.js";
import { PLACEHOLDER, PLOTLY_CDN, escapeHtml, formatNumber, renderPage } from "./html.js";

/** Metadata keys shown in the info grid, in display order. */
export const METADATA_KEYS = [
  "Date",
  "Lot",
  "Wafer",
  "Die",
  "Subsite",
  "DeviceName",
  "DevTechno",
  "DevPolarity",
  "Setup",
  "W",
  "L",
  "Temperature",
] as const;

/**
 * Real/imaginary series of one S-parameter in one block.
 */
export interface SmithTrace {
  block: number;
  parameter: string;
  label: string;
  real: number[];
  imag: number[];
  frequency: number[] | null;
}

/**
 * "VG=0.5, VB=0" style label for a block's conditions.
 */
export const blockLabel = (block: MeasurementBlock): string => {
  const entries = Object.entries(block.vars);
  if (entries.length === 0) {
    return `Block ${block.index}`;
  }
  return entries.map(([name, value]) => `${name}=${value}`).join(", ");
};

/**
 * Columns of a block as displayed: the ICCAP_VAR conditions followed by the
 * data columns, with swept inputs first in sweep order.
 */
export const displayColumns = (
  block: MeasurementBlock,
  inputs: readonly InputVariable[],
): string[] => {
  const all = [...Object.keys(block.vars), ...block.columns];
  return orderColumnsBySweep([...new Set(all)], inputs);
};

/**
 * Smith chart series from `R:<param>` / `I:<param>` column pairs.
 */
export const buildSmithTraces = (
  blocks: readonly MeasurementBlock[],
  parameters: readonly string[],
): SmithTrace[] => {
  const traces: SmithTrace[] = [];

  for (const block of blocks) {
    const freqColumn = block.columns.find((col) =>
      ["freq", "frequency"].includes(col.toLowerCase()),
    );
    for (const parameter of parameters) {
      const realCol = `R:${parameter}`;
      const imagCol = `I:${parameter}`;
      if (!block.columns.includes(realCol) || !block.columns.includes(imagCol)) {
        continue;
      }
      traces.push({
        block: block.index,
        parameter,
        label: blockLabel(block),
        real: block.rows.map((row) => row[realCol]),
        imag: block.rows.map((row) => row[imagCol]),
        frequency: freqColumn ? block.rows.map((row) => row[freqColumn]) : null,
      });
    }
  }

  return traces;
};

const cell = (text: string, className?: string): string =>
  className
    ? `<td><span class="${className}">${escapeHtml(text)}</span></td>`
    : `<td>${escapeHtml(text)}</td>`;

const renderInputsTable = (parsed: ParsedMdm): string =>
  parsed.inputs
    .map(
      (input) =>
        `<tr>${cell(input.name, "var-name")}${cell(input.unit, "var-unit")}${cell(
          nodeLabel(input),
          "var-node",
        )}${cell(input.kind === "bias" ? input.source : "", "var-smu")}${cell(
          input.sweep.label,
          "var-sweep",
        )}${cell(input.sweep.option, "var-sweep")}</tr>`,
    )
    .join("\n");

const renderOutputsTable = (parsed: ParsedMdm): string =>
  sortOutputsByNodeOrder(parsed.outputs, parsed.inputs)
    .map(
      (output) =>
        `<tr>${cell(output.name, "var-name")}${cell(output.unit, "var-unit")}${cell(
          nodeLabel(output),
          "var-node",
        )}${cell(output.source, "var-smu")}${cell(output.option || PLACEHOLDER, "var-sweep")}</tr>`,
    )
    .join("\n");

const renderMetadata = (values: Record<string, string>): string =>
  METADATA_KEYS.filter((key) => values[key])
    .map(
      (key) =>
        `<div class="metadata-item"><span class="metadata-label">${escapeHtml(
          key,
        )}:</span><span class="metadata-value">${escapeHtml(values[key])}</span></div>`,
    )
    .join("\n");

const renderBlockOptions = (blocks: readonly MeasurementBlock[]): string =>
  [
    '<option value="all">All</option>',
    ...blocks.map(
      (block) =>
        `<option value="${block.index}">${escapeHtml(blockLabel(block))}</option>`,
    ),
  ].join("");

/**
 * Data table: one header from the first block, every row of every block
 * tagged with its block index so the page can filter by block.
 */
const renderDataTable = (parsed: ParsedMdm): { head: string; body: string } => {
  const [first] = parsed.blocks;
  if (!first) {
    return { head: "", body: "" };
  }

  const columns = displayColumns(first, parsed.inputs);
  const head = `<tr><th>#</th>${columns
    .map((col) => `<th>${escapeHtml(col)}</th>`)
    .join("")}</tr>`;

  const body = parsed.blocks
    .flatMap((block) =>
      block.rows.map((row, i) => {
        const cells = columns
          .map((col) => `<td>${formatNumber(block.vars[col] ?? row[col])}</td>`)
          .join("");
        return `<tr data-block="${block.index}"><td>${i + 1}</td>${cells}</tr>`;
      }),
    )
    .join("\n");

  return { head, body };
};

const renderDcCvControls = (parsed: ParsedMdm): string => {
  const [first] = parsed.blocks;
  const xOptions = (first ? displayColumns(first, parsed.inputs) : [])
    .map((col) => `<option value="${escapeHtml(col)}">${escapeHtml(col)}</option>`)
    .join("");
  const yOptions = parsed.outputs
    .map(
      (output, i) =>
        `<label class="checkbox-item"><input type="checkbox" value="${escapeHtml(
          output.name,
        )}"${i === 0 ? " checked" : ""}><span>${escapeHtml(output.name)}</span></label>`,
    )
    .join("");

  return `<div class="control-group"><span class="control-label">X-Axis</span><select id="x-axis-select">${xOptions}</select></div>
<div class="control-group"><span class="control-label">Y-Axis</span><div class="checkbox-group" id="y-axis-checkboxes">${yOptions}</div></div>
<div class="control-group"><span class="control-label">X Scale</span><div class="plot-type-btns" id="x-scale-btns"><button class="plot-type-btn active" data-scale="linear">Linear</button><button class="plot-type-btn" data-scale="log">Log</button></div></div>
<div class="control-group"><span class="control-label">Y Scale</span><div class="plot-type-btns" id="y-scale-btns"><button class="plot-type-btn active" data-scale="linear">Linear</button><button class="plot-type-btn" data-scale="log">Log</button></div></div>`;
};

const renderSmithControls = (parameters: readonly string[]): string => {
  const options = parameters
    .map(
      (name, i) =>
        `<label class="checkbox-item"><input type="checkbox" value="${escapeHtml(
          name,
        )}"${i === 0 ? " checked" : ""}><span>${escapeHtml(name)}</span></label>`,
    )
    .join("");
  return `<div class="control-group"><span class="control-label">S-Parameters</span><div class="checkbox-group" id="sparam-checkboxes">${options}</div></div>`;
};

/**
 * Render the viewer page for a parsed MDM file.
 */
export const renderMdmViewer = (parsed: ParsedMdm, title: string): string => {
  const sParameters = parsed.outputs
    .filter((output) => output.unit === "S")
    .map((output) => output.name);
  const isSmith = parsed.dataType === "s-parameter";
  const table = renderDataTable(parsed);

  const body = `<div class="container">
<header><h1>${escapeHtml(title)}</h1></header>
<div class="grid">
<div class="card"><h2 class="card-title">INPUTS</h2>
<table class="regime-table"><thead><tr><th>Variable</th><th>Unit</th><th>Node</th><th>SMU</th><th>Sweep</th><th>Option</th></tr></thead>
<tbody id="inputs-table">${renderInputsTable(parsed)}</tbody></table></div>
<div class="card"><h2 class="card-title">OUTPUTS</h2>
<table class="regime-table"><thead><tr><th>Variable</th><th>Unit</th><th>Node</th><th>SMU</th><th>Option</th></tr></thead>
<tbody id="outputs-table">${renderOutputsTable(parsed)}</tbody></table></div>
</div>
<div class="card"><h2 class="card-title">MEASUREMENT INFO</h2><div class="metadata-grid">${renderMetadata(parsed.header.values)}</div></div>
<section class="graph-card">
<div class="graph-controls">
${isSmith ? renderSmithControls(sParameters) : renderDcCvControls(parsed)}
<div class="control-group"><span class="control-label">Sweep</span><select id="block-select">${renderBlockOptions(parsed.blocks)}</select></div>
<div class="control-group push-right"><button class="action-btn" id="save-plot-btn">Save PNG</button></div>
</div>
<div id="plot"></div>
</section>
<section class="data-table-card">
<div class="table-header"><h2 class="table-title">Measurement Data</h2>
<div class="table-actions"><select id="table-block-select">${renderBlockOptions(parsed.blocks)}</select>
<button class="action-btn" id="copy-table-btn">Copy Data</button></div></div>
<div class="table-container"><table class="data-table"><thead id="table-head">${table.head}</thead><tbody id="table-body">${table.body}</tbody></table></div>
</section>
</div>`;

  return renderPage({
    title,
    styles: ["base.css", "mdm-viewer.css"],
    body,
    data: {
      MDM_TITLE: title,
      MDM_DATA_TYPE: parsed.dataType,
      MDM_BLOCKS: parsed.blocks.map((block) => ({
        index: block.index,
        label: blockLabel(block),
        vars: block.vars,
        columns: block.columns,
        rows: block.rows,
      })),
      MDM_SMITH_TRACES: isSmith ? buildSmithTraces(parsed.blocks, sParameters) : [],
    },
    scripts: ["common.js", "mdm-viewer.js"],
    externalScripts: [PLOTLY_CDN],
  });
};
