/**
 * Tests for MDM file discovery
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import {
  findMdmFiles,
  getReportPath,
  isMdmFile,
  organizeMdmFiles,
} from "./discovery.js";

describe("isMdmFile", () => {
  it("should match the extension case-insensitively", () => {
    expect(isMdmFile("a/b/id_vg.mdm")).toBe(true);
    expect(isMdmFile("ID_VG.MDM")).toBe(true);
    expect(isMdmFile("WPro.csv")).toBe(false);
    expect(isMdmFile("mdm")).toBe(false);
  });
});

describe("findMdmFiles", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "mdm-discovery-"));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  const touch = async (...segments: string[]): Promise<string> => {
    const filePath = join(testDir, ...segments);
    await mkdir(join(filePath, ".."), { recursive: true });
    await writeFile(filePath, "");
    return filePath;
  };

  it("should find MDM files recursively in sorted order", async () => {
    const b = await touch("W1", "T27", "b.mdm");
    const a = await touch("W1", "T27", "a.mdm");
    const c = await touch("W2", "c.mdm");
    await touch("W1", "notes.txt");

    expect(await findMdmFiles(testDir)).toEqual([a, b, c]);
  });

  it("should skip Report directories", async () => {
    const kept = await touch("W1", "x.mdm");
    await touch("Report", "W1", "x.mdm");
    await touch("W1", "Report", "y.mdm");

    expect(await findMdmFiles(testDir)).toEqual([kept]);
  });

  it("should return an empty list for a folder without MDM files", async () => {
    expect(await findMdmFiles(testDir)).toEqual([]);
  });
});

describe("getReportPath", () => {
  it("should mirror the relative path under the report folder", () => {
    const lotDir = join("/data", "LOT42");
    const reportDir = join(lotDir, "Report");
    const mdmPath = join(lotDir, "Wafer_1", "T27", "id_vg.mdm");

    expect(getReportPath(mdmPath, lotDir, reportDir)).toBe(
      join(reportDir, "Wafer_1", "T27", "id_vg.html"),
    );
  });
});

describe("organizeMdmFiles", () => {
  const lotDir = join("/data", "LOT42");
  const file = (...segments: string[]): string => join(lotDir, ...segments);

  it("should group files by wafer, temperature, die and group", () => {
    const a = file("Wafer_1", "T27", "WholeDie", "N", "X0-Y0", "DC~G1", "id_vg.mdm");
    const b = file("Wafer_1", "T27", "WholeDie", "N", "X0-Y0", "DC~G1", "id_vd.mdm");
    const c = file("Wafer_1", "T85", "WholeDie", "N", "X1-Y0", "DC~G2", "cv.mdm");

    const tree = organizeMdmFiles([a, b, c], lotDir);

    expect([...tree.keys()]).toEqual(["Wafer_1"]);
    expect(tree.get("Wafer_1")?.get("T27")?.get("X0-Y0")?.get("DC~G1")).toEqual([a, b]);
    expect(tree.get("Wafer_1")?.get("T85")?.get("X1-Y0")?.get("DC~G2")).toEqual([c]);
  });

  it("should leave out files with a shallow path", () => {
    const shallow = file("Wafer_1", "T27", "id_vg.mdm");
    expect(organizeMdmFiles([shallow], lotDir).size).toBe(0);
  });
});
