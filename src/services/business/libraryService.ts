/**
 * Library Service
 * Lookup and listing of downloaded audio files inside the download directory.
 */

import { stat, unlink } from "fs/promises";
import fs from "fs";
import path from "path";
import { DOWNLOAD_DIR } from "../../config/env.js";
import { NotFoundError, errorMessage } from "../../utils/errors.js";
import { walkFiles } from "../../utils/fsWalk.js";
import { compareCodePoints } from "../../utils/filename.js";

/** Extensions accepted as audio as delivered by the site (no conversion happens). */
export const AUDIO_EXTENSIONS: ReadonlySet<string> = new Set(["m4a", "webm", "opus", "mp4", "m4b", "mp3"]);

function extensionOf(filePath: string): string {
  return path.extname(filePath).replace(/^\./, "").toLowerCase();
}

export function isAudioFile(filePath: string): boolean {
  return AUDIO_EXTENSIONS.has(extensionOf(filePath));
}

/**
 * Path of a library file relative to the download directory, "/"-separated,
 * which is also what GET /files/<path> accepts.
 */
export function toLibraryName(filePath: string): string {
  return path.relative(DOWNLOAD_DIR, filePath).split(path.sep).join("/");
}

/**
 * Every audio file in the library, sorted by code point.
 */
export async function listAudioFiles(): Promise<string[]> {
  const files = await walkFiles(DOWNLOAD_DIR);
  return files.filter(isAudioFile).map(toLibraryName).sort(compareCodePoints);
}

/**
 * Finds the most recently modified audio file named "<safeTitle>.<ext>".
 */
export async function findAudioFile(safeTitle: string): Promise<string | null> {
  const prefix = `${safeTitle}.`;
  const files = await walkFiles(DOWNLOAD_DIR);
  const candidates = files.filter((file) => path.basename(file).startsWith(prefix) && isAudioFile(file));

  if (candidates.length === 0) {
    return null;
  }

  const withTimes = await Promise.all(
    candidates.map(async (file) => ({ file, mtimeMs: (await stat(file)).mtimeMs }))
  );
  withTimes.sort((a, b) => b.mtimeMs - a.mtimeMs);

  return withTimes[0]?.file ?? null;
}

/**
 * The exact "<safeTitle>.<ext>" when present, otherwise the best lookup match.
 */
export async function resolveDownloadedFile(safeTitle: string, ext: string): Promise<string | null> {
  const exact = path.join(DOWNLOAD_DIR, `${safeTitle}.${ext}`);
  if (fs.existsSync(exact)) {
    return exact;
  }
  return findAudioFile(safeTitle);
}

/**
 * Deletes the saved web page yt-dlp may leave beside a download.
 * Failure is logged, never thrown.
 */
export async function removeSidecarPage(safeTitle: string): Promise<void> {
  const mhtml = path.join(DOWNLOAD_DIR, `${safeTitle}.mhtml`);
  if (!fs.existsSync(mhtml)) {
    return;
  }

  try {
    await unlink(mhtml);
    console.log(`[library] Removed sidecar page: ${path.basename(mhtml)}`);
  } catch (error) {
    console.warn(`[library] Failed to remove ${mhtml}:`, errorMessage(error));
  }
}

/**
 * Resolves a requested file name to an absolute path inside the library.
 * Names that would escape the download directory are treated as missing.
 */
export function resolveLibraryPath(requested: string): string {
  if (!requested || requested.includes("\0") || path.isAbsolute(requested)) {
    throw new NotFoundError("File", requested);
  }

  const resolved = path.resolve(DOWNLOAD_DIR, requested);
  const relative = path.relative(DOWNLOAD_DIR, resolved);
  if (!relative || relative === ".." || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    throw new NotFoundError("File", requested);
  }

  return resolved;
}
