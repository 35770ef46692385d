/**
 * Rate Limiting Middleware
 * Prevents API abuse by limiting request rates per IP.
 */

import rateLimit from "express-rate-limit";

const WINDOW_MS = 15 * 60 * 1000; // 15 minutes

/** JSON body matches the error handler's { error } shape */
function createLimiter(max: number, message: string) {
  return rateLimit({
    windowMs: WINDOW_MS,
    max,
    message: { error: message },
    standardHeaders: true, // Return rate limit info in `RateLimit-*` headers
    legacyHeaders: false, // Disable `X-RateLimit-*` headers
  });
}

/** 200 requests per window: previews, listings, file retrieval. */
export const apiLimiter = createLimiter(200, "Too many requests from this IP, please try again later.");

/** 20 requests per window: each download runs yt-dlp and writes to disk. */
export const strictLimiter = createLimiter(20, "Too many downloads, please slow down.");
