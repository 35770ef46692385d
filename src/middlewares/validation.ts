/**
 * Validation Middleware
 * Validates request bodies against Zod schemas.
 */

import { Request, Response, NextFunction } from "express";
import type { ZodIssue, ZodType, ZodTypeDef } from "zod";

export interface ValidationDetail {
  path: string;
  message: string;
}

export function toValidationDetails(issues: readonly ZodIssue[]): ValidationDetail[] {
  return issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

/**
 * Replaces req.body with the parsed (trimmed, defaulted) value.
 * Answers 400 with one detail per issue if invalid.
 * A request without a JSON body is validated as {}.
 */
export function validateBody<T>(schema: ZodType<T, ZodTypeDef, unknown>) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.body ?? {});
    if (!result.success) {
      res.status(400).json({
        error: "Validation failed",
        details: toValidationDetails(result.error.issues),
      });
      return;
    }
    req.body = result.data;
    next();
  };
}
