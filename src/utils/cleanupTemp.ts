/**
 * Cleanup utility for interrupted downloads
 * Runs on startup to clear leftovers yt-dlp did not finish or remove
 */

import fs from "fs";
import path from "path";
import { DOWNLOAD_DIR } from "../config/env.js";
import { walkFiles } from "./fsWalk.js";

/** Partial downloads, yt-dlp resume state and saved web pages */
const LEFTOVER_EXTENSIONS = new Set([".part", ".ytdl", ".temp", ".mhtml"]);

export function isLeftover(filePath: string): boolean {
  return LEFTOVER_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

/**
 * Removes leftovers in the download directory older than maxAgeHours.
 * Returns the number of files removed.
 */
export async function cleanupPartialDownloads(maxAgeHours: number = 24, dir: string = DOWNLOAD_DIR): Promise<number> {
  if (!fs.existsSync(dir)) {
    console.log("[cleanup] No download directory found, nothing to clean");
    return 0;
  }

  console.log(`[cleanup] Scanning ${dir} for stale partial downloads...`);

  const now = Date.now();
  const maxAgeMs = maxAgeHours * 60 * 60 * 1000;
  let removedFiles = 0;
  let freedMB = 0;

  const files = await walkFiles(dir);
  for (const file of files.filter(isLeftover)) {
    try {
      const stats = fs.statSync(file);
      if (now - stats.mtimeMs < maxAgeMs) {
        continue;
      }
      fs.unlinkSync(file);
      removedFiles++;
      freedMB += stats.size / (1024 * 1024);
    } catch (err) {
      console.warn(`[cleanup] Failed to process ${file}:`, err);
    }
  }

  console.log(`[cleanup] ✓ Removed ${removedFiles} files, freed ${freedMB.toFixed(1)}MB`);
  return removedFiles;
}
