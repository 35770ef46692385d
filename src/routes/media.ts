/**
 * Media Routes
 * Preview and download endpoints.
 */

import { Router } from "express";
import { preview, download } from "../controllers/mediaController.js";
import { validateBody } from "../middlewares/validation.js";
import { mediaUrlSchema } from "../middlewares/schemas/mediaSchemas.js";
import { strictLimiter } from "../middlewares/rateLimiting.js";

export const mediaRouter = Router();

/** Video details and the chosen audio format, nothing downloaded */
mediaRouter.post("/preview", validateBody(mediaUrlSchema), preview);

/** Download the best audio-only stream */
mediaRouter.post("/downloads", strictLimiter, validateBody(mediaUrlSchema), download);
