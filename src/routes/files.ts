/**
 * Files Routes
 * Listing and retrieval of downloaded audio.
 */

import { Router } from "express";
import { listFiles, serveFile } from "../controllers/filesController.js";

export const filesRouter = Router();

filesRouter.get("/files", listFiles);

/** Nested paths are allowed; anything outside the download directory is a 404 */
filesRouter.get("/files/*", serveFile);
