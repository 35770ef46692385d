/**
 * Route Aggregator
 * Combines all routers into a single exported router.
 */

import { Router } from "express";
import { healthRouter } from "./health.js";
import { mediaRouter } from "./media.js";
import { filesRouter } from "./files.js";

export const router = Router();

/** Register all route modules */
router.use(healthRouter);
router.use(mediaRouter);
router.use(filesRouter);
