/**
 * Filename utilities
 * Keeps video titles usable as file names on Windows, macOS and Linux.
 */

const INVALID_CHARS = /[<>:"/\\|?*\0]/g;

const RESERVED_NAMES = new Set([
  "CON", "PRN", "AUX", "NUL",
  "COM1", "COM2", "COM3", "COM4", "COM5", "COM6", "COM7", "COM8", "COM9",
  "LPT1", "LPT2", "LPT3", "LPT4", "LPT5", "LPT6", "LPT7", "LPT8", "LPT9",
]);

/**
 * Replaces characters invalid on common filesystems with "_",
 * strips trailing dots/spaces and escapes reserved device names.
 * Never returns an empty string.
 */
export function sanitizeFilename(name: string): string {
  let cleaned = name.replace(INVALID_CHARS, "_");
  cleaned = cleaned.trim().replace(/[. ]+$/, "");

  if (RESERVED_NAMES.has(cleaned.toUpperCase())) {
    cleaned = `_${cleaned}`;
  }

  return cleaned || "audio";
}

/** yt-dlp treats "%" as a template field marker; "%%" is a literal percent. */
export function toOutputTemplate(safeTitle: string): string {
  return `${safeTitle.replace(/%/g, "%%")}.%(ext)s`;
}

/**
 * Orders strings by Unicode code point. The default "<" compares UTF-16 code units,
 * which puts astral characters (emoji) before U+E000-U+FFFF.
 */
export function compareCodePoints(a: string, b: string): number {
  const left = [...a];
  const right = [...b];
  const length = Math.min(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const diff = (left[i]?.codePointAt(0) ?? 0) - (right[i]?.codePointAt(0) ?? 0);
    if (diff !== 0) {
      return diff;
    }
  }
  return left.length - right.length;
}
