/**
 * Application Initialization
 * Prepares the download directory and checks the yt-dlp binary on startup.
 */

import { mkdir } from "fs/promises";
import { DOWNLOAD_DIR, STALE_PARTIAL_HOURS } from "./env.js";
import { cleanupPartialDownloads } from "../utils/cleanupTemp.js";
import { getYtDlpVersion } from "../services/external/ytdlp.js";
import { errorMessage } from "../utils/errors.js";

/**
 * Initializes application dependencies on startup.
 */
export async function initializeApp(): Promise<void> {
  console.log("Initializing application...");

  try {
    await mkdir(DOWNLOAD_DIR, { recursive: true });
    console.log(`✓ Download directory: ${DOWNLOAD_DIR}`);

    await cleanupPartialDownloads(STALE_PARTIAL_HOURS);

    // A missing binary only breaks /preview and /downloads; listing and serving still work
    try {
      const version = await getYtDlpVersion();
      console.log(`✓ yt-dlp ${version}`);
    } catch (error) {
      console.warn(`⚠️  yt-dlp unavailable: ${errorMessage(error)}`);
    }

    console.log("✓ Application initialized successfully\n");
  } catch (error) {
    console.error("✗ Application initialization failed:", error);
    throw error;
  }
}
