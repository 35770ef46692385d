/**
 * Media Validation Schemas
 * Zod schemas for the URL submitted to /preview and /downloads.
 */

import { z } from "zod";

const HTTP_URL = /^https?:\/\//i;

/** Non-strings count as missing; the format check only runs on a non-empty value. */
export const mediaUrlSchema = z.object({
  url: z.preprocess(
    (value) => (typeof value === "string" ? value.trim() : ""),
    z.string().min(1, "URL is required").pipe(z.string().regex(HTTP_URL, "Invalid URL format"))
  ),
});

export type MediaUrlBody = z.infer<typeof mediaUrlSchema>;
