/**
 * Media Controller
 * Handles HTTP requests for previewing and downloading audio.
 */

import { Request, Response, NextFunction } from "express";
import { previewMedia, downloadAudio } from "../services/business/mediaService.js";
import { buildFileUrl } from "../utils/fileUrl.js";
import type { MediaUrlBody } from "../middlewares/schemas/mediaSchemas.js";

/**
 * POST /preview
 * Returns video details and the audio format a download would use
 */
export async function preview(
  req: Request<Record<string, string>, unknown, MediaUrlBody>,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const result = await previewMedia(req.body.url);
    res.json(result);
  } catch (error) {
    next(error);
  }
}

/**
 * POST /downloads
 * Downloads the best audio-only stream and returns a link to it
 */
export async function download(
  req: Request<Record<string, string>, unknown, MediaUrlBody>,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const result = await downloadAudio(req.body.url);

    res.status(200).json({
      title: result.title,
      filename: result.filename,
      file_url: buildFileUrl(req, result.filename),
      status: result.status,
    });
  } catch (error) {
    next(error);
  }
}
