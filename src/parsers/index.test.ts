/**
 * Tests for format detection
 */

import { describe, it, expect } from "vitest";
import { findFormat } from "./index.js";

describe("findFormat", () => {
  it("should detect each format by extension", () => {
    expect(findFormat("lot/Wafer_1/id_vg.mdm")).toBe("mdm");
    expect(findFormat("lot/WPro.CSV")).toBe("wpro");
  });

  it("should return undefined for other files", () => {
    expect(findFormat("notes.txt")).toBeUndefined();
    expect(findFormat("Makefile")).toBeUndefined();
  });
});
