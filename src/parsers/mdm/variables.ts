/**
 * Decoding of MDM input/output declarations and sweep ordering.
 */

import type {
  InputVariable,
  MdmDataType,
  OutputVariable,
  SweepDescriptor,
} from "../../types.js";

const CONSTANT_SWEEP = "CON";

const tokenize = (line: string): string[] => {
  const trimmed = line.trim();
  return trimmed ? trimmed.split(/\s+/) : [];
};

const at = (parts: string[], index: number): string => parts[index] ?? "";

/**
 * Build the sweep descriptor from the sweep type and its five parameters.
 * For LIN/LOG/LIST sweeps the first parameter is the sweep order; for CON it
 * is the constant value.
 */
const describeSweep = (type: string, params: string[]): SweepDescriptor => {
  if (type === CONSTANT_SWEEP) {
    return { type, order: null, label: "CON", option: at(params, 0) };
  }
  if (!type) {
    return { type, order: null, label: "", option: "" };
  }

  const order = Number.parseInt(at(params, 0), 10);
  return {
    type,
    order: Number.isInteger(order) && order > 0 ? order : null,
    label: `VAR${at(params, 0)}`,
    option: `${type}: ${at(params, 1)} → ${at(params, 2)} (${at(params, 3)} pts, step ${at(params, 4)})`,
  };
};

/**
 * Parse one ICCAP_INPUTS declaration line.
 */
export const parseInputVariable = (line: string): InputVariable => {
  const parts = tokenize(line);
  const name = at(parts, 0);
  const unit = at(parts, 1);

  if (unit === "F") {
    const params = parts.slice(3, 8);
    return {
      kind: "frequency",
      name,
      unit,
      sweep: describeSweep(at(parts, 2), params),
      start: at(parts, 4),
      stop: at(parts, 5),
      points: at(parts, 6),
      step: at(parts, 7),
    };
  }

  const params = parts.slice(7, 12);
  return {
    kind: "bias",
    name,
    unit,
    terminal: at(parts, 2),
    ground: at(parts, 3),
    source: at(parts, 4),
    compliance: at(parts, 5),
    sweep: describeSweep(at(parts, 6), params),
    params,
  };
};

/**
 * Parse one ICCAP_OUTPUTS declaration line.
 */
export const parseOutputVariable = (line: string): OutputVariable => {
  const parts = tokenize(line);
  const name = at(parts, 0);
  const unit = at(parts, 1);

  if (unit === "S") {
    return {
      name,
      unit,
      nodes: [at(parts, 2), at(parts, 3)],
      ground: at(parts, 4),
      source: at(parts, 5),
      option: at(parts, 6),
    };
  }

  return {
    name,
    unit,
    nodes: [at(parts, 2)],
    ground: at(parts, 3),
    source: at(parts, 4),
    option: at(parts, 5),
  };
};

/**
 * Terminal node(s) of an input or output as a single display string.
 */
export const nodeLabel = (variable: InputVariable | OutputVariable): string => {
  if ("nodes" in variable) {
    return variable.nodes.join(" ");
  }
  return variable.kind === "bias" ? variable.terminal : "";
};

const compareOrder = (a: number | null, b: number | null): number => {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return a - b;
};

/**
 * Sort inputs by sweep order; constants and unordered inputs go last.
 * Ties keep declaration order.
 */
export const sortInputsBySweepOrder = (
  inputs: readonly InputVariable[],
): InputVariable[] =>
  [...inputs].sort((a, b) => compareOrder(a.sweep.order, b.sweep.order));

/**
 * Sort outputs so they follow the node order of the (already sorted) inputs.
 */
export const sortOutputsByNodeOrder = (
  outputs: readonly OutputVariable[],
  sortedInputs: readonly InputVariable[],
): OutputVariable[] => {
  const nodeOrder = sortedInputs.map(nodeLabel);
  const rank = (output: OutputVariable): number => {
    const idx = nodeOrder.indexOf(nodeLabel(output));
    return idx === -1 ? Number.MAX_SAFE_INTEGER : idx;
  };
  return [...outputs].sort((a, b) => rank(a) - rank(b));
};

/**
 * Order table columns: input columns by sweep order, then everything else
 * in its original order.
 */
export const orderColumnsBySweep = (
  columns: readonly string[],
  inputs: readonly InputVariable[],
): string[] => {
  const orderByName = new Map(inputs.map((input) => [input.name, input.sweep.order]));
  const inputColumns = columns.filter((col) => orderByName.has(col));
  const otherColumns = columns.filter((col) => !orderByName.has(col));

  inputColumns.sort((a, b) =>
    compareOrder(orderByName.get(a) ?? null, orderByName.get(b) ?? null),
  );

  return [...inputColumns, ...otherColumns];
};

/**
 * S-parameter data when the primary sweep (order 1) is a frequency.
 */
export const detectDataType = (inputs: readonly InputVariable[]): MdmDataType => {
  const primary = inputs.find((input) => input.sweep.order === 1);
  return primary?.unit === "F" ? "s-parameter" : "dc-cv";
};
