/**
 * Open a generated page in the default browser.
 */

import { spawn } from "node:child_process";
import { pathToFileURL } from "node:url";

/**
 * Command line that opens a URL on the given platform.
 */
export const browserCommand = (
  url: string,
  platform: NodeJS.Platform = process.platform,
): { command: string; args: string[] } => {
  switch (platform) {
    case "darwin":
      return { command: "open", args: [url] };
    case "win32":
      // `start` treats its first quoted argument as the window title.
      return { command: "cmd", args: ["/c", "start", '""', url] };
    default:
      return { command: "xdg-open", args: [url] };
  }
};

/**
 * Launch the browser on a local file without waiting for it.
 * A browser that cannot be started is reported, never fatal.
 */
export const openInBrowser = (filePath: string): void => {
  const url = pathToFileURL(filePath).href;
  const { command, args } = browserCommand(url);

  const child = spawn(command, args, {
    stdio: "ignore",
    detached: true,
  });

  child.on("error", (err) => {
    console.error(`Failed to open browser: ${err.message}`);
    console.log(`Open manually: ${url}`);
  });

  child.unref();
};
