/**
 * yt-dlp Service
 * Reads media metadata and downloads a single format using the yt-dlp binary.
 */

import YTDlpWrap from "yt-dlp-wrap";
import fs from "fs";
import { YTDLP_PATH, YTDLP_COOKIES_PATH } from "../../config/env.js";
import { mediaInfoSchema, type MediaInfo } from "../../types/media.js";
import { ExtractionError, errorMessage } from "../../utils/errors.js";

const ytDlp = new YTDlpWrap(YTDLP_PATH);

/** Flags shared by every invocation: single video, no user config, no chatter. */
const BASE_ARGS = ["--no-playlist", "--ignore-config", "--quiet", "--no-warnings"];

function cookieArgs(): string[] {
  if (YTDLP_COOKIES_PATH && fs.existsSync(YTDLP_COOKIES_PATH)) {
    return ["--cookies", YTDLP_COOKIES_PATH];
  }
  return [];
}

/**
 * Runs yt-dlp and returns its stdout.
 * Engine failures are logged and re-thrown as ExtractionError.
 */
async function run(args: string[]): Promise<string> {
  try {
    return await ytDlp.execPromise(args);
  } catch (error) {
    const message = errorMessage(error);
    console.error(`[ytdlp] Command failed:`, message);
    console.error(`[ytdlp] Binary path attempted:`, YTDLP_PATH);
    throw new ExtractionError(message, error instanceof Error ? error : undefined);
  }
}

/**
 * Fetches metadata for a single video without downloading it.
 */
export async function fetchMediaInfo(url: string): Promise<MediaInfo> {
  console.log(`[ytdlp] Fetching metadata: ${url}`);

  const stdout = await run([
    url,
    "--dump-single-json",
    "--skip-download",
    ...BASE_ARGS,
    ...cookieArgs(),
  ]);

  const trimmed = stdout.trim();
  if (!trimmed || trimmed === "null") {
    throw new ExtractionError("No information could be retrieved");
  }

  let raw: unknown;
  try {
    raw = JSON.parse(trimmed);
  } catch (error) {
    throw new ExtractionError(`Unreadable metadata: ${errorMessage(error)}`);
  }

  const parsed = mediaInfoSchema.safeParse(raw);
  if (!parsed.success) {
    console.warn("[ytdlp] Metadata validation failed:", parsed.error.issues);
    throw new ExtractionError("No information could be retrieved");
  }

  console.log(`[ytdlp] Title: ${parsed.data.title ?? "(untitled)"}`);
  return parsed.data;
}

/**
 * Downloads exactly one format, as-is (no conversion).
 * outputTemplate is an absolute yt-dlp output template.
 */
export async function downloadFormat(url: string, formatId: string, outputTemplate: string): Promise<void> {
  console.log(`[ytdlp] Downloading format ${formatId} from: ${url}`);
  console.log(`[ytdlp] Output template: ${outputTemplate}`);

  await run([
    url,
    "-f",
    formatId,
    "-o",
    outputTemplate,
    ...BASE_ARGS,
    "--ignore-errors",
    "--windows-filenames",
    "--force-overwrites",
    "--rm-cache-dir",
    "--no-write-pages",
    ...cookieArgs(),
  ]);

  console.log(`[ytdlp] Download completed`);
}

/**
 * Returns the installed yt-dlp version string.
 */
export async function getYtDlpVersion(): Promise<string> {
  const stdout = await run(["--version"]);
  return stdout.trim();
}
