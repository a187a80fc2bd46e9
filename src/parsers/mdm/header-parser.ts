/**
 * Parser for the MDM header (ICCAP_INPUTS / ICCAP_OUTPUTS / ICCAP_VALUES)
 */

import type { MdmHeader } from "../../types.js";

type HeaderSection = "none" | "inputs" | "outputs" | "values" | "done";

interface HeaderState {
  section: HeaderSection;
  header: MdmHeader;
}

const SECTION_MARKERS = new Map<string, HeaderSection>([
  ["ICCAP_INPUTS", "inputs"],
  ["ICCAP_OUTPUTS", "outputs"],
  ["ICCAP_VALUES", "values"],
  ["END_HEADER", "done"],
]);

const VALUE_LINE = /^(\w+)\s+"([^"]*)"/;

/**
 * Advance the header state by one trimmed line.
 */
const step = (state: HeaderState, line: string): HeaderState => {
  if (state.section === "done") {
    return state;
  }

  const marker = SECTION_MARKERS.get(line);
  if (marker !== undefined) {
    return { ...state, section: marker };
  }

  if (!line) {
    return state;
  }

  const { header } = state;
  switch (state.section) {
    case "inputs":
      return { ...state, header: { ...header, inputs: [...header.inputs, line] } };
    case "outputs":
      return { ...state, header: { ...header, outputs: [...header.outputs, line] } };
    case "values": {
      const match = VALUE_LINE.exec(line);
      if (!match) {
        return state;
      }
      return {
        ...state,
        header: { ...header, values: { ...header.values, [match[1]]: match[2] } },
      };
    }
    case "none":
      return state;
  }
};

/**
 * Parse MDM header content (pure function for testing).
 * Scanning stops at END_HEADER; lines before ICCAP_INPUTS are ignored.
 */
export const parseMdmHeaderContent = (content: string): MdmHeader => {
  const initial: HeaderState = {
    section: "none",
    header: { inputs: [], outputs: [], values: {} },
  };

  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .reduce(step, initial).header;
};

const firstToken = (line: string): string => line.split(/\s+/)[0];

/**
 * Names of the declared input variables, in declaration order.
 */
export const listInputNames = (header: MdmHeader): string[] =>
  header.inputs.map(firstToken);

/**
 * Names of the declared output variables, in declaration order.
 */
export const listOutputNames = (header: MdmHeader): string[] =>
  header.outputs.map(firstToken);
