/**
 * Audio Format Selection
 * Picks the audio-only stream to download from the formats yt-dlp reports.
 * Preference: AAC/M4A, then Opus/WebM, then anything else; higher bitrate first.
 */

import type { MediaFormat } from "../types/media.js";

/** 0 = AAC/M4A, 1 = Opus/WebM, 2 = other */
export type AudioPriority = 0 | 1 | 2;

/** A format with no video codec ("none" or unreported) carries only audio. */
export function isAudioOnly(format: MediaFormat): boolean {
  return format.vcodec == null || format.vcodec === "none";
}

export function audioPriority(format: MediaFormat): AudioPriority {
  const ext = (format.ext ?? "").toLowerCase();
  const acodec = (format.acodec ?? "").toLowerCase();

  if (ext === "m4a" || acodec.startsWith("mp4a") || acodec.includes("aac")) {
    return 0;
  }
  if (ext === "webm" || ext === "opus" || acodec.includes("opus")) {
    return 1;
  }
  return 2;
}

/**
 * Returns the best audio-only format, or null when there is none.
 * Ties on priority and bitrate keep the order yt-dlp listed them in.
 */
export function pickBestAudio<T extends MediaFormat>(formats: readonly T[] | null | undefined): T | null {
  if (!formats || formats.length === 0) {
    return null;
  }

  const audios = formats.filter(isAudioOnly);
  if (audios.length === 0) {
    return null;
  }

  const ranked = [...audios].sort((a, b) => {
    const byPriority = audioPriority(a) - audioPriority(b);
    if (byPriority !== 0) {
      return byPriority;
    }
    return (b.abr ?? 0) - (a.abr ?? 0);
  });

  return ranked[0] ?? null;
}
