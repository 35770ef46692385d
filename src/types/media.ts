/**
 * Media Types
 * Shapes of the metadata yt-dlp prints with --dump-single-json, and of our API responses.
 * Only the fields we read are declared; everything else passes through untouched.
 */

import { z } from "zod";

export const mediaFormatSchema = z
  .object({
    format_id: z.string().nullish(),
    ext: z.string().nullish(),
    acodec: z.string().nullish(),
    vcodec: z.string().nullish(),
    abr: z.number().nullish(),
  })
  .passthrough();

export const mediaInfoSchema = z
  .object({
    title: z.string().nullish(),
    uploader: z.string().nullish(),
    channel: z.string().nullish(),
    duration: z.number().nullish(),
    thumbnail: z.string().nullish(),
    webpage_url: z.string().nullish(),
    formats: z.array(mediaFormatSchema).nullish(),
  })
  .passthrough();

export type MediaFormat = z.infer<typeof mediaFormatSchema>;
export type MediaInfo = z.infer<typeof mediaInfoSchema>;

export interface BestAudioSummary {
  format_id: string | null;
  ext: string | null;
  abr: number | null;
  acodec: string | null;
}

/** POST /preview response body */
export interface PreviewResult {
  title: string | null;
  uploader: string | null;
  duration: number | null;
  thumbnail: string | null;
  webpage_url: string;
  best_audio: BestAudioSummary;
}

/** Outcome of a finished download, before the public link is attached */
export interface DownloadResult {
  title: string;
  /** Relative to the download directory, "/"-separated */
  filename: string;
  status: "Downloaded";
}
