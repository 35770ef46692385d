/**
 * Environment Configuration
 * Validates and exports type-safe environment variables.
 * Fails fast at startup if a numeric variable is malformed.
 */

import path from "path";

/** Server configuration */
export const PORT = getIntEnv("PORT", 5000);
export const NODE_ENV = process.env.NODE_ENV || "development";
/** Optional public base URL (e.g., behind a reverse proxy) used for building file links */
export const PUBLIC_BASE_URL = process.env.PUBLIC_BASE_URL?.replace(/\/+$/, "") || undefined;

/** Download directory, always absolute */
export const DOWNLOAD_DIR = path.resolve(process.env.DOWNLOAD_FOLDER || "./downloads");

/** yt-dlp configuration */
export const YTDLP_PATH = process.env.YTDLP_PATH || "yt-dlp";
export const YTDLP_COOKIES_PATH = process.env.YTDLP_COOKIES_PATH || undefined;

/** Partial downloads older than this are removed on startup */
export const STALE_PARTIAL_HOURS = getIntEnv("STALE_PARTIAL_HOURS", 24);

/**
 * Helper to read a non-negative integer variable.
 * Throws immediately if the value is present but not a number.
 */
function getIntEnv(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`Missing or invalid environment variable: ${key}`);
  }
  return value;
}
