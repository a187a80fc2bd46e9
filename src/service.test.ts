/**
 * Service Unit Tests - viewer generation, inspection and lot folder lookup
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { existsSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import {
  describeMdm,
  generateLotReport,
  generateMdmViewer,
  generateMdmViewers,
  normalizePath,
  resolveLotFolder,
} from "./service.js";
import { isErrorResult } from "./types.js";

const GOOD_MDM = `ICCAP_INPUTS
VDS V 1 0 1 0 LIN 1 0 1 3 0.5
ICCAP_OUTPUTS
ID A 1 0 1
END_HEADER
BEGIN_DB
ICCAP_VAR TEMP 25
#VDS ID
0 0.001
1 0.003
END_DB
BEGIN_DB
ICCAP_VAR TEMP 85
END_DB
BEGIN_DB
ICCAP_VAR TEMP 125
#VDS ID
0 0.002
END_DB
`;

const BAD_MDM = "BEGIN_DB\nICCAP_VAR TEMP hot\n#A\n1\nEND_DB\n";

let testDir: string;

beforeEach(async () => {
  testDir = await mkdtemp(join(tmpdir(), "wafer-service-"));
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(testDir, { recursive: true, force: true });
});

describe("normalizePath", () => {
  it.skipIf(process.platform === "win32")("should convert backslashes on Unix", () => {
    expect(normalizePath("data\\LOT42//WPro.csv")).toBe("data/LOT42/WPro.csv");
  });
});

describe("resolveLotFolder", () => {
  it("should use the CSV folder when it is named after the lot", async () => {
    const lotDir = join(testDir, "LOT42");
    await mkdir(join(lotDir, "LOT42"), { recursive: true });
    expect(resolveLotFolder(join(lotDir, "WPro.csv"), "LOT42")).toBe(lotDir);
  });

  it("should use a sibling folder named after the lot", async () => {
    await mkdir(join(testDir, "LOT42"));
    expect(resolveLotFolder(join(testDir, "WPro.csv"), "LOT42")).toBe(join(testDir, "LOT42"));
  });

  it("should fall back to the CSV folder", () => {
    expect(resolveLotFolder(join(testDir, "WPro.csv"), "LOT42")).toBe(testDir);
  });
});

describe("generateMdmViewer", () => {
  it("should write the page beside the input by default", async () => {
    const mdmPath = join(testDir, "id_vd.mdm");
    await writeFile(mdmPath, GOOD_MDM);

    const result = await generateMdmViewer(mdmPath);

    expect(result).toBe(join(testDir, "id_vd.html"));
    const html = await readFile(join(testDir, "id_vd.html"), "utf-8");
    expect(html).toContain("<h1>id_vd.mdm</h1>");
  });

  it("should create the folders of an explicit output path", async () => {
    const mdmPath = join(testDir, "id_vd.mdm");
    await writeFile(mdmPath, GOOD_MDM);
    const outputPath = join(testDir, "out", "nested", "page.html");

    expect(await generateMdmViewer(mdmPath, { outputPath })).toBe(outputPath);
    expect(existsSync(outputPath)).toBe(true);
  });

  it("should reject a file without data blocks", async () => {
    const mdmPath = join(testDir, "empty.mdm");
    await writeFile(mdmPath, "ICCAP_INPUTS\nEND_HEADER\n");

    expect(await generateMdmViewer(mdmPath)).toEqual({
      error: `${mdmPath}: No data blocks found in MDM file`,
    });
    expect(existsSync(join(testDir, "empty.html"))).toBe(false);
  });

  it("should report format errors", async () => {
    const mdmPath = join(testDir, "bad.mdm");
    await writeFile(mdmPath, BAD_MDM);

    expect(await generateMdmViewer(mdmPath)).toEqual({
      error: `${mdmPath}: Invalid ICCAP_VAR value 'hot' for 'TEMP' in block 0`,
    });
  });
});

describe("generateMdmViewers", () => {
  it("should skip failing files and keep going", async () => {
    const lotDir = join(testDir, "LOT42");
    const reportDir = join(lotDir, "Report");
    await mkdir(join(lotDir, "W1"), { recursive: true });
    const bad = join(lotDir, "W1", "a_bad.mdm");
    const good = join(lotDir, "W1", "b_good.mdm");
    await writeFile(bad, BAD_MDM);
    await writeFile(good, GOOD_MDM);

    const result = await generateMdmViewers([bad, good], lotDir, reportDir);

    expect([...result.entries()]).toEqual([[good, join(reportDir, "W1", "b_good.html")]]);
    expect(console.error).toHaveBeenCalledWith(
      `  Error generating ${join("W1", "a_bad.mdm")}: ${bad}: Invalid ICCAP_VAR value 'hot' for 'TEMP' in block 0`,
    );
    expect(console.log).toHaveBeenCalledWith(`  Generated: ${join("W1", "b_good.html")}`);
  });
});

describe("describeMdm", () => {
  it("should return every block and the region count", async () => {
    const mdmPath = join(testDir, "id_vd.mdm");
    await writeFile(mdmPath, GOOD_MDM);

    const result = await describeMdm(mdmPath);

    expect(isErrorResult(result)).toBe(false);
    if (isErrorResult(result)) return;
    expect(result.regionCount).toBe(3);
    expect(result.blocks.map((b) => b.index)).toEqual([0, 2]);
  });

  it("should narrow to the block of one region", async () => {
    const mdmPath = join(testDir, "id_vd.mdm");
    await writeFile(mdmPath, GOOD_MDM);

    const result = await describeMdm(mdmPath, 2);

    if (isErrorResult(result)) throw new Error(result.error);
    expect(result.blocks).toEqual([
      { index: 2, vars: { TEMP: 125 }, columns: ["VDS", "ID"], rows: [{ VDS: 0, ID: 0.002 }] },
    ]);
  });

  it("should return no blocks for an empty region", async () => {
    const mdmPath = join(testDir, "id_vd.mdm");
    await writeFile(mdmPath, GOOD_MDM);

    const result = await describeMdm(mdmPath, 1);

    if (isErrorResult(result)) throw new Error(result.error);
    expect(result.blocks).toEqual([]);
  });

  it("should report an index out of range", async () => {
    const mdmPath = join(testDir, "id_vd.mdm");
    await writeFile(mdmPath, GOOD_MDM);

    expect(await describeMdm(mdmPath, 3)).toEqual({
      error: `${mdmPath}: Block index 3 out of range. File has 3 blocks.`,
    });
  });
});

describe("generateLotReport", () => {
  it("should return an error for a CSV without a header row", async () => {
    const csvPath = join(testDir, "WPro.csv");
    await writeFile(csvPath, "*Lot,LOT42\n");

    const result = await generateLotReport(csvPath);

    expect(result).toEqual({
      error: `${csvPath}: WPro file has no header row: every line is a comment or blank`,
    });
    expect(existsSync(join(testDir, "Report"))).toBe(false);
  });

  it("should write the index page and call onComplete", async () => {
    const csvPath = join(testDir, "WPro.csv");
    await writeFile(csvPath, "*Lot,LOT42\nWafer,Die,$,VTH,ResultRead\nW1,X0-Y0,,0.4,\n");
    const onComplete = vi.fn();

    const result = await generateLotReport(csvPath, { onComplete });

    const indexPath = join(testDir, "Report", "index.html");
    expect(result).toBe(indexPath);
    expect(onComplete).toHaveBeenCalledWith(indexPath);
    const html = await readFile(indexPath, "utf-8");
    expect(html).toContain('<p class="muted">No MDM files found</p>');
  });
});
