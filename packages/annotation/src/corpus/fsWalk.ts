/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import { readdir } from "node:fs/promises";
import path from "node:path";

function byPath(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

async function readEntries(dir: string) {
  try {
    return await readdir(dir, { withFileTypes: true });
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return [];
    }
    throw error;
  }
}

/**
 * Every directory below `root` (not `root` itself), sorted by full path.
 * A missing root has no directories.
 */
export async function listDirectories(root: string): Promise<string[]> {
  const found: string[] = [];
  const pending = [root];
  while (pending.length > 0) {
    const dir = pending.pop();
    if (dir === undefined) break;
    for (const entry of await readEntries(dir)) {
      if (entry.isDirectory()) {
        const child = path.join(dir, entry.name);
        found.push(child);
        pending.push(child);
      }
    }
  }
  return found.sort(byPath);
}

/**
 * Files directly inside `dir` whose name matches `pattern`, sorted by path.
 */
export async function listFiles(dir: string, pattern: RegExp): Promise<string[]> {
  const entries = await readEntries(dir);
  return entries
    .filter((entry) => entry.isFile() && pattern.test(entry.name))
    .map((entry) => path.join(dir, entry.name))
    .sort(byPath);
}

/**
 * Files anywhere below `root` whose name matches `pattern`, sorted by path.
 */
export async function listFilesRecursive(root: string, pattern: RegExp): Promise<string[]> {
  const dirs = [root, ...(await listDirectories(root))];
  const files: string[] = [];
  for (const dir of dirs) {
    files.push(...(await listFiles(dir, pattern)));
  }
  return files.sort(byPath);
}
