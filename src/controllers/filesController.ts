/**
 * Files Controller
 * Lists and serves downloaded audio files.
 */

import path from "path";
import { Request, Response, NextFunction } from "express";
import { listAudioFiles, resolveLibraryPath } from "../services/business/libraryService.js";
import { NotFoundError } from "../utils/errors.js";

/**
 * GET /files
 */
export async function listFiles(_req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const files = await listAudioFiles();
    res.json({ files });
  } catch (error) {
    next(error);
  }
}

/**
 * GET /files/<path>
 * Sends the file as an attachment
 */
export function serveFile(req: Request, res: Response, next: NextFunction): void {
  const requested = req.params[0] ?? "";

  let filePath: string;
  try {
    filePath = resolveLibraryPath(requested);
  } catch (error) {
    next(error);
    return;
  }

  // The path is already confined to the library; titles may start with "."
  res.download(filePath, path.basename(filePath), { dotfiles: "allow" }, (error) => {
    if (!error) {
      return;
    }
    if (res.headersSent) {
      console.error(`[files] Transfer of ${requested} aborted:`, error.message);
      return;
    }
    next(isMissingFile(error) ? new NotFoundError("File", requested) : error);
  });
}

function isMissingFile(error: Error): boolean {
  return ("code" in error && (error.code === "ENOENT" || error.code === "EISDIR")) ||
    ("status" in error && error.status === 404);
}
