/**
 * TypeScript type definitions for measurement parsing and wafer statistics
 */

// =============================================================================
// MDM Types
// =============================================================================

/**
 * Raw header sections of an MDM file.
 * Input and output declarations are kept verbatim, one entry per line.
 */
export interface MdmHeader {
  inputs: string[];
  outputs: string[];
  values: Record<string, string>;
}

/**
 * Sweep settings shared by both input layouts.
 * `order` is null for constant (CON) inputs and inputs without a sweep.
 */
export interface SweepDescriptor {
  type: string;
  order: number | null;
  label: string;
  option: string;
}

/**
 * Frequency input (unit F):
 * `name unit sweepType sweepOrder start stop points step`
 */
export interface FrequencyInput {
  kind: "frequency";
  name: string;
  unit: "F";
  sweep: SweepDescriptor;
  start: string;
  stop: string;
  points: string;
  step: string;
}

/**
 * Voltage or current input:
 * `name unit terminal ground source compliance sweepType param1..param5`
 */
export interface BiasInput {
  kind: "bias";
  name: string;
  unit: string;
  terminal: string;
  ground: string;
  source: string;
  compliance: string;
  sweep: SweepDescriptor;
  params: string[];
}

export type InputVariable = FrequencyInput | BiasInput;

/**
 * Output declaration. S-parameter outputs (unit S) carry two nodes.
 */
export interface OutputVariable {
  name: string;
  unit: string;
  nodes: string[];
  ground: string;
  source: string;
  option: string;
}

/**
 * One BEGIN_DB/END_DB region with data.
 * `index` counts every region in the file, including empty ones.
 */
export interface MeasurementBlock {
  index: number;
  vars: Record<string, number>;
  columns: string[];
  rows: Array<Record<string, number>>;
}

/** Plot flavour picked from the first swept input. */
export type MdmDataType = "dc-cv" | "s-parameter";

/**
 * Fully parsed MDM file
 */
export interface ParsedMdm {
  header: MdmHeader;
  inputs: InputVariable[];
  outputs: OutputVariable[];
  blocks: MeasurementBlock[];
  dataType: MdmDataType;
}

// =============================================================================
// WPro Types
// =============================================================================

/** Raw CSV cells keyed by column name. */
export type WproRow = Record<string, string>;

export interface WproTable {
  columns: string[];
  rows: WproRow[];
  /** `key,value` pairs from the preamble */
  headerInfo: Record<string, string>;
  /** Values from the "Meas Condition Description" sub-table */
  measConditions: Record<string, string>;
}

/** Columns every WPro export carries. */
export const WPRO_COLUMNS = {
  wafer: "Wafer",
  die: "Die",
  temperature: "Temperature (C)",
  block: "Block",
  subsite: "Subsite",
  name: "Name",
} as const;

export const RESULT_START_SENTINEL = "$";
export const RESULT_END_SENTINEL = "ResultRead";

// =============================================================================
// Statistics Types
// =============================================================================

/**
 * Descriptive statistics for one result column across the whole table
 */
export interface ParameterStatistics {
  count: number;
  mean: number;
  std: number;
  min: number;
  max: number;
  median: number;
  cv: number;
}

export interface DefinedPivotStatistics {
  min: number;
  max: number;
  average: number;
  median: number;
  stdDev: number;
}

export interface UndefinedPivotStatistics {
  min: null;
  max: null;
  average: null;
  median: null;
  stdDev: null;
}

/** Either all five statistics exist or none do. */
export type PivotStatistics = DefinedPivotStatistics | UndefinedPivotStatistics;

/**
 * One (wafer, temperature, device, parameter) row spanning all dies
 */
export interface PivotRow {
  wafer: string;
  temperature: string;
  device: string;
  parameter: string;
  values: Record<string, number | string>;
  stats: PivotStatistics;
}

export interface MeasurementsPivot {
  dies: string[];
  rows: PivotRow[];
}

export interface WaferSummary {
  wafer: string;
  dieCount: number;
  temperatures: string[];
  blocks: string[];
  subsites: string[];
}

export interface TemperatureSummary {
  temperature: string;
  dieCount: number;
}

// =============================================================================
// Results
// =============================================================================

/**
 * Error result structure
 */
export interface ErrorResult {
  error: string;
}

/**
 * Type guard to check if result is an error
 */
export const isErrorResult = (result: unknown): result is ErrorResult =>
  typeof result === "object" &&
  result !== null &&
  "error" in result &&
  typeof result.error === "string";

/**
 * Extract a message from anything thrown.
 */
export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
