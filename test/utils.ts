/**
 * Test utilities for fixture-based tests.
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";

const TEST_DIR = path.dirname(fileURLToPath(import.meta.url));
export const FIXTURES_DIR = path.join(TEST_DIR, "fixtures");

/**
 * Copy a fixture directory into a fresh temporary directory, so tests that
 * write reports never touch the committed fixtures.
 *
 * @returns Path of the copy
 */
export const copyFixture = async (name: string): Promise<string> => {
  const target = await fs.mkdtemp(path.join(os.tmpdir(), `${name}-`));
  await fs.cp(path.join(FIXTURES_DIR, name), target, { recursive: true });
  return target;
};

/**
 * Remove a directory created by copyFixture.
 */
export const removeFixtureCopy = async (dir: string): Promise<void> => {
  await fs.rm(dir, { recursive: true, force: true, maxRetries: 3 });
};

/**
 * Every file under a directory, as paths relative to it with forward slashes.
 */
export const listFiles = async (dir: string, prefix = ""): Promise<string[]> => {
  const results: string[] = [];
  const entries = await fs.readdir(path.join(dir, prefix), { withFileTypes: true });

  for (const entry of entries) {
    const relative = prefix ? `${prefix}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      results.push(...(await listFiles(dir, relative)));
    } else if (entry.isFile()) {
      results.push(relative);
    }
  }

  return results.sort();
};
