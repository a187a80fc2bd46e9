/**
 * Tests for the WPro CSV loader
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import {
  getLotName,
  getResultColumns,
  getUniqueDies,
  getUniqueNames,
  getUniqueTemperatures,
  getUniqueValues,
  getUniqueWafers,
  loadWpro,
  parseWproContent,
  splitPreamble,
} from "./csv-loader.js";

const WPRO = `*HEADER_START
*Lot,LOT42
*HEADER_END
Wafer,Die,Temperature (C),Name,$,VTH,IDSAT,ResultRead,Extra
W2,X0-Y0,25,nmos,,0.45,1e-3,,a
W1,X1-Y0,85,nmos,,0.47,,,b
W2,X1-Y0,25,pmos,,-0.5,2e-3,,c
`;

describe("splitPreamble", () => {
  it("should split at the first non-comment line", () => {
    const { preamble, body } = splitPreamble("*a,1\n\n*b,2\nH1,H2\n1,2\n");

    expect(preamble).toEqual(["*a,1", "*b,2"]);
    expect(body).toBe("H1,H2\n1,2\n");
  });

  it("should throw when every line is a comment or blank", () => {
    expect(() => splitPreamble("*a,1\n\n*b,2\n")).toThrow(
      "WPro file has no header row: every line is a comment or blank",
    );
    expect(() => splitPreamble("")).toThrow("no header row");
  });
});

describe("parseWproContent", () => {
  it("should read columns, rows and header info", () => {
    const table = parseWproContent(WPRO);

    expect(table.columns).toEqual([
      "Wafer",
      "Die",
      "Temperature (C)",
      "Name",
      "$",
      "VTH",
      "IDSAT",
      "ResultRead",
      "Extra",
    ]);
    expect(table.rows).toHaveLength(3);
    expect(table.rows[1]).toEqual({
      Wafer: "W1",
      Die: "X1-Y0",
      "Temperature (C)": "85",
      Name: "nmos",
      $: "",
      VTH: "0.47",
      IDSAT: "",
      ResultRead: "",
      Extra: "b",
    });
    expect(table.headerInfo).toEqual({ Lot: "LOT42" });
  });

  it("should fill short rows with empty cells", () => {
    const table = parseWproContent("A,B,C\n1\n");
    expect(table.rows).toEqual([{ A: "1", B: "", C: "" }]);
  });

  it("should number duplicate column names and keep every cell", () => {
    const table = parseWproContent("A,B,A\n1,2,3\n");
    expect(table.columns).toEqual(["A", "B", "A.1"]);
    expect(table.rows).toEqual([{ A: "1", B: "2", "A.1": "3" }]);
  });

  it("should read quoted cells and trim whitespace", () => {
    const table = parseWproContent('Name,Note\n nmos ,"x, y"\n');
    expect(table.rows).toEqual([{ Name: "nmos", Note: "x, y" }]);
  });

  it("should strip a byte order mark on the header row", () => {
    const table = parseWproContent("\uFEFFWafer,Die\nW1,X0-Y0\n");
    expect(table.columns).toEqual(["Wafer", "Die"]);
  });

  it("should handle CRLF line endings", () => {
    const table = parseWproContent("*Lot,L1\r\nA,B\r\n1,2\r\n");
    expect(table.headerInfo).toEqual({ Lot: "L1" });
    expect(table.rows).toEqual([{ A: "1", B: "2" }]);
  });
});

describe("unique values", () => {
  const table = parseWproContent(WPRO);

  it("should keep first-encountered order", () => {
    expect(getUniqueWafers(table)).toEqual(["W2", "W1"]);
    expect(getUniqueDies(table)).toEqual(["X0-Y0", "X1-Y0"]);
    expect(getUniqueTemperatures(table)).toEqual(["25", "85"]);
    expect(getUniqueNames(table)).toEqual(["nmos", "pmos"]);
  });

  it("should return an empty list for an unknown column", () => {
    expect(getUniqueValues(table, "Subsite")).toEqual([]);
  });
});

describe("getResultColumns", () => {
  it("should return the columns strictly between the sentinels", () => {
    expect(getResultColumns(["A", "$", "B", "C", "ResultRead", "D"])).toEqual(["B", "C"]);
  });

  it("should return an empty list when a sentinel is missing", () => {
    expect(getResultColumns(["A", "$", "B"])).toEqual([]);
    expect(getResultColumns(["A", "B", "ResultRead"])).toEqual([]);
  });

  it("should return an empty list when the end precedes the start", () => {
    expect(getResultColumns(["ResultRead", "B", "$"])).toEqual([]);
  });

  it("should use the first occurrence of each sentinel", () => {
    expect(getResultColumns(["$", "A", "ResultRead", "$", "B", "ResultRead"])).toEqual(["A"]);
  });
});

describe("getLotName", () => {
  it("should read the lot from the preamble", () => {
    expect(getLotName(parseWproContent(WPRO))).toBe("LOT42");
  });

  it("should fall back to Unknown", () => {
    expect(getLotName(parseWproContent("A\n1\n"))).toBe("Unknown");
  });
});

describe("loadWpro", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "wpro-load-"));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it("should load a file from disk", async () => {
    const filePath = join(testDir, "WPro.csv");
    await writeFile(filePath, WPRO);

    const table = await loadWpro(filePath);
    expect(getResultColumns(table.columns)).toEqual(["VTH", "IDSAT"]);
  });

  it("should prefix format errors with the file path", async () => {
    const filePath = join(testDir, "empty.csv");
    await writeFile(filePath, "*only,comments\n");

    await expect(loadWpro(filePath)).rejects.toThrow(`${filePath}: WPro file has no header row`);
  });
});
