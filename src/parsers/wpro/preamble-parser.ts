/**
 * Parser for the `*`-prefixed preamble of WPro CSV exports
 */

export interface WproPreamble {
  headerInfo: Record<string, string>;
  measConditions: Record<string, string>;
}

const COMMENT_PREFIX = /^\*[,\s]*/;

const splitCells = (content: string): string[] =>
  content
    .split(",")
    .map((cell) => cell.trim())
    .filter(Boolean);

/**
 * Parse preamble lines (pure function for testing).
 *
 * Outside the Meas Condition Description sub-table every `key,value` line
 * becomes a header entry (the value keeps any further commas). Inside it the
 * first line names the columns and each later line maps them to values.
 */
export const parseWproPreamble = (lines: readonly string[]): WproPreamble => {
  const headerInfo: Record<string, string> = {};
  const measConditions: Record<string, string> = {};
  let inMeasCondition = false;
  let conditionColumns: string[] = [];

  for (const line of lines) {
    const content = line.trim().replace(COMMENT_PREFIX, "").trim();

    if (content.startsWith("Start Meas Condition Description")) {
      inMeasCondition = true;
      continue;
    }
    if (content.startsWith("End Meas Condition Description")) {
      inMeasCondition = false;
      continue;
    }
    if (content === "HEADER_START" || content === "HEADER_END") {
      continue;
    }

    if (inMeasCondition) {
      if (conditionColumns.length === 0) {
        conditionColumns = splitCells(content);
        continue;
      }
      splitCells(content).forEach((value, i) => {
        if (i < conditionColumns.length) {
          measConditions[conditionColumns[i]] = value;
        }
      });
      continue;
    }

    const comma = content.indexOf(",");
    if (comma === -1) continue;
    const key = content.slice(0, comma).trim();
    const value = content.slice(comma + 1).trim();
    if (key && value) {
      headerInfo[key] = value;
    }
  }

  return { headerInfo, measConditions };
};
