/**
 * Health Check Routes
 * Infrastructure endpoints for monitoring and orchestration.
 */

import { Router } from "express";

export const healthRouter = Router();

/** Flipped once initializeApp() has prepared the download directory. */
let ready = false;

export function setReady(value: boolean): void {
  ready = value;
}

/** Simple health check endpoint. */
healthRouter.get("/health", (_req, res) => {
  res.json({ ok: true });
});

/** Readiness check endpoint for container orchestration. */
healthRouter.get("/ready", (_req, res) => {
  res.status(ready ? 200 : 503).json({ ready });
});
