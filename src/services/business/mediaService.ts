/**
 * Media Service
 * Preview and download orchestration around yt-dlp.
 */

import path from "path";
import { fetchMediaInfo, downloadFormat } from "../external/ytdlp.js";
import { pickBestAudio } from "../../utils/audioFormat.js";
import { sanitizeFilename, toOutputTemplate } from "../../utils/filename.js";
import { ExtractionError, MissingOutputError, NoAudioFormatError, errorMessage } from "../../utils/errors.js";
import { DOWNLOAD_DIR } from "../../config/env.js";
import { resolveDownloadedFile, removeSidecarPage, toLibraryName } from "./libraryService.js";
import type { DownloadResult, PreviewResult } from "../../types/media.js";

/**
 * Describes a video and the audio stream a download would pick, without downloading.
 */
export async function previewMedia(url: string): Promise<PreviewResult> {
  try {
    const info = await fetchMediaInfo(url);
    const best = pickBestAudio(info.formats);

    return {
      title: info.title ?? null,
      uploader: info.uploader || info.channel || null,
      duration: info.duration ?? null,
      thumbnail: info.thumbnail ?? null,
      webpage_url: info.webpage_url || url,
      best_audio: {
        format_id: best?.format_id ?? null,
        ext: best?.ext ?? null,
        abr: best?.abr ?? null,
        acodec: best?.acodec ?? null,
      },
    };
  } catch (error) {
    throw new ExtractionError(`Preview failed: ${errorMessage(error)}`, error instanceof Error ? error : undefined);
  }
}

/**
 * Downloads the best audio-only stream of a video into the download directory.
 */
export async function downloadAudio(url: string): Promise<DownloadResult> {
  try {
    // 1) Metadata, to choose the format
    const info = await fetchMediaInfo(url);
    const title = info.title || "audio";
    const safeTitle = sanitizeFilename(title);

    const best = pickBestAudio(info.formats);
    if (!best || !best.format_id) {
      throw new NoAudioFormatError();
    }
    const ext = (best.ext ?? "").toLowerCase() || "m4a";

    // 2) Download that exact format, unconverted
    console.log(`[download] "${title}" -> format ${best.format_id} (${ext})`);
    await downloadFormat(url, best.format_id, path.join(DOWNLOAD_DIR.replace(/%/g, "%%"), toOutputTemplate(safeTitle)));

    // 3) Locate the final file
    const finalPath = await resolveDownloadedFile(safeTitle, ext);
    await removeSidecarPage(safeTitle);

    if (!finalPath) {
      throw new MissingOutputError();
    }

    console.log(`[download] ✓ Saved ${finalPath}`);
    return {
      title,
      filename: toLibraryName(finalPath),
      status: "Downloaded",
    };
  } catch (error) {
    if (error instanceof NoAudioFormatError || error instanceof MissingOutputError) {
      throw error;
    }
    throw new ExtractionError(`Download failed: ${errorMessage(error)}`, error instanceof Error ? error : undefined);
  }
}
