/**
 * Filesystem walking shared by the library and startup cleanup.
 */

import { readdir } from "fs/promises";
import fs from "fs";
import path from "path";

/**
 * Recursively collects absolute paths of regular files under dir.
 * A missing directory yields an empty list.
 */
export async function walkFiles(dir: string): Promise<string[]> {
  if (!fs.existsSync(dir)) {
    return [];
  }

  const entries = await readdir(dir, { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await walkFiles(fullPath)));
    } else if (entry.isFile()) {
      files.push(fullPath);
    }
  }

  return files;
}
