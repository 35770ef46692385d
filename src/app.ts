import express from "express";
import helmet from "helmet";
import cors from "cors";
import path from "path";
import { router } from "./routes/index.js";
import { apiLimiter } from "./middlewares/rateLimiting.js";
import { errorHandler } from "./middlewares/errorHandler.js";

/** Single-page form served at "/" */
const PUBLIC_DIR = path.resolve(__dirname, "../public");

/**
 * Express application instance.
 * Configures global middleware and routes.
 */
export const app = express();

/** Disable the X-Powered-By header to reduce fingerprinting. */
app.disable("x-powered-by");

/** Adds standard security headers. */
app.use(helmet());
/** Enables CORS for cross-origin requests. */
app.use(cors());
/** Parses JSON request bodies; only { url } is expected. */
app.use(express.json({ limit: "100kb" }));

/** Rate limiting for all routes. */
app.use(apiLimiter);

/** Home page and its script. */
app.use(express.static(PUBLIC_DIR));

/** Application routes. */
app.use(router);

/** Global error handler - MUST be last. */
app.use(errorHandler);
