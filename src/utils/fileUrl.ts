/**
 * Public links to files in the download directory.
 */

import type { Request } from "express";
import { PUBLIC_BASE_URL } from "../config/env.js";

/**
 * Absolute URL of GET /files/<path>; each path segment is encoded.
 * Uses PUBLIC_BASE_URL when configured, otherwise the request's own origin.
 */
export function buildFileUrl(req: Request, filename: string): string {
  const origin = PUBLIC_BASE_URL ?? `${req.protocol}://${req.get("host") ?? "localhost"}`;
  const encoded = filename.split("/").map(encodeURIComponent).join("/");
  return `${origin}/files/${encoded}`;
}
