/**
 * MDM file discovery module.
 * Finds .mdm files under a lot folder and maps them into the report tree.
 *
 * Lot folders are laid out as Wafer/Temperature/<x>/<y>/Die/MeasGroup/file.mdm,
 * e.g. Wafer_1/T27/WholeDie/N/X0-Y0/WPro_MOSFET_DC~MeasGroup1/id_vg.mdm.
 */

import { readdir } from "fs/promises";
import path from "path";

export const MDM_EXTENSIONS = [".mdm"] as const;

/** Directory holding generated output; never scanned. */
export const REPORT_DIR_NAME = "Report";

/**
 * wafer -> temperature -> die -> measurement group -> files
 */
export type MdmTree = Map<string, Map<string, Map<string, Map<string, string[]>>>>;

/**
 * Check if a file is an MDM file based on extension.
 */
export const isMdmFile = (filePath: string): boolean => {
  const ext = path.extname(filePath).toLowerCase();
  return MDM_EXTENSIONS.some((candidate) => candidate === ext);
};

/**
 * Recursively find MDM files, skipping Report directories.
 * Unreadable directories (EACCES) are skipped.
 */
export const findMdmFiles = async (lotDir: string): Promise<string[]> => {
  const results: string[] = [];

  const walk = async (currentDir: string): Promise<void> => {
    let entries;
    try {
      entries = await readdir(currentDir, { withFileTypes: true });
    } catch (error) {
      if (
        !(error instanceof Error) ||
        !("code" in error) ||
        error.code !== "EACCES"
      ) {
        throw error;
      }
      return;
    }

    for (const entry of entries) {
      const fullPath = path.join(currentDir, entry.name);
      if (entry.isDirectory()) {
        if (entry.name === REPORT_DIR_NAME) continue;
        await walk(fullPath);
        continue;
      }

      if (entry.isFile() && isMdmFile(entry.name)) {
        results.push(fullPath);
      }
    }
  };

  await walk(lotDir);
  return results.sort();
};

/**
 * Output path for an MDM file: same relative path under the report folder,
 * with an .html extension.
 */
export const getReportPath = (
  mdmPath: string,
  lotDir: string,
  reportDir: string,
): string => {
  const relative = path.relative(lotDir, mdmPath);
  const parsed = path.parse(relative);
  return path.join(reportDir, parsed.dir, `${parsed.name}.html`);
};

const getOrCreate = <K, V>(map: Map<K, V>, key: K, create: () => V): V => {
  let value = map.get(key);
  if (value === undefined) {
    value = create();
    map.set(key, value);
  }
  return value;
};

/**
 * Group MDM files by wafer, temperature, die and measurement group.
 * Files whose relative path has fewer than six segments are left out.
 */
export const organizeMdmFiles = (
  mdmFiles: readonly string[],
  lotDir: string,
): MdmTree => {
  const tree: MdmTree = new Map();

  for (const mdmPath of mdmFiles) {
    const parts = path.relative(lotDir, mdmPath).split(path.sep);
    if (parts.length < 6) continue;

    const [wafer, temperature, , , die, group] = parts;
    const temps = getOrCreate(tree, wafer, () => new Map());
    const dies = getOrCreate(temps, temperature, () => new Map());
    const groups = getOrCreate(dies, die, () => new Map());
    getOrCreate(groups, group, () => []).push(mdmPath);
  }

  return tree;
};
