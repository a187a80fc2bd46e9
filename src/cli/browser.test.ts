/**
 * Tests for the browser launch command
 */

import { describe, it, expect } from "vitest";
import { browserCommand } from "./browser.js";

describe("browserCommand", () => {
  const url = "file:///data/LOT42/Report/index.html";

  it("should use open on macOS", () => {
    expect(browserCommand(url, "darwin")).toEqual({ command: "open", args: [url] });
  });

  it("should use start through cmd on Windows", () => {
    expect(browserCommand(url, "win32")).toEqual({
      command: "cmd",
      args: ["/c", "start", '""', url],
    });
  });

  it("should use xdg-open elsewhere", () => {
    expect(browserCommand(url, "linux")).toEqual({ command: "xdg-open", args: [url] });
  });
});
