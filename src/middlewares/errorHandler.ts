/**
 * Error Handler Middleware
 * Centralized error handling for Express application.
 */

import { Request, Response, NextFunction } from "express";
import { AppError } from "../utils/errors.js";
import { NODE_ENV } from "../config/env.js";

interface ErrorResponse {
  error: string;
  stack?: string;
}

/**
 * Status carried by errors from Express itself or body-parser (e.g. malformed JSON).
 */
function httpStatusOf(error: Error): number | undefined {
  const candidate: unknown =
    "status" in error ? error.status : "statusCode" in error ? error.statusCode : undefined;
  if (typeof candidate === "number" && candidate >= 400 && candidate < 600) {
    return candidate;
  }
  return undefined;
}

/**
 * Global error handler middleware.
 * Catches all errors and returns appropriate responses.
 * MUST be registered last in middleware chain.
 */
export function errorHandler(
  error: Error | AppError,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const statusCode = error instanceof AppError ? error.statusCode : httpStatusOf(error) ?? 500;
  const message = error.message || "Internal server error";

  console.error(`[Error] ${statusCode} - ${message}`, {
    error: error.name,
    stack: error.stack,
    path: req.path,
    method: req.method,
  });

  const response: ErrorResponse = {
    error: message,
  };

  // Include stack trace in development
  if (NODE_ENV !== "production") {
    response.stack = error.stack;
  }

  res.status(statusCode).json(response);
}
