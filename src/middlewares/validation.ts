/**
 * Validation Middleware
 * Validates request bodies and route params against Zod schemas.
 */

import type { Request, Response, NextFunction } from "express";
import { ZodError, type ZodSchema } from "zod";

function sendValidationError(res: Response, error: ZodError): void {
  res.status(400).json({
    error: "Validation failed",
    details: error.issues.map((e) => ({
      path: e.path.join("."),
      message: e.message,
    })),
  });
}

/**
 * Validates request body against a Zod schema.
 * Replaces the body with the parsed value; returns 400 with the issues if invalid.
 */
export function validateBody(schema: ZodSchema) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body);
    if (!result.success) {
      sendValidationError(res, result.error);
      return;
    }
    req.body = result.data;
    next();
  };
}

/**
 * Validates route params (e.g. :jobId) without replacing them.
 */
export function validateParams(schema: ZodSchema) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.params);
    if (!result.success) {
      sendValidationError(res, result.error);
      return;
    }
    next();
  };
}
