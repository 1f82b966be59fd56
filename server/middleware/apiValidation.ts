import type { Request, Response, NextFunction } from "express";
import { z, type ZodSchema } from "zod";
import { logError } from "../logger";

/**
 * Middleware to validate request body against a Zod schema
 */
export function validateBody<T extends ZodSchema>(schema: T) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.body);
    if (!result.success) {
      res.status(400).json({
        error: "Validation failed",
        details: result.error.errors.map((err) => ({
          path: err.path.join("."),
          message: err.message,
        })),
      });
      return; // Don't call next() after sending response
    }
    req.body = result.data;
    next();
  };
}

/**
 * Standard error response format
 */
export interface ApiError {
  error: string;
  message: string;
  timestamp: string;
  stack?: string;
}

function statusFor(err: unknown): number {
  if (err instanceof z.ZodError) {
    return 400;
  }
  if (err instanceof RangeError) {
    return 400;
  }
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return 500;
}

/**
 * Standardized error handler
 */
export function apiErrorHandler(err: unknown, req: Request, res: Response, next: NextFunction): void {
  // Don't handle if response already sent
  if (res.headersSent) {
    return next(err);
  }

  const error = err instanceof Error ? err : new Error(String(err));
  const status = statusFor(err);

  logError(`${req.method} ${req.path}: ${error.message}`, "api");

  const errorResponse: ApiError = {
    error: error.name,
    message: error.message || "An error occurred",
    timestamp: new Date().toISOString(),
  };

  if (process.env.NODE_ENV === "development" && status >= 500) {
    errorResponse.stack = error.stack;
  }

  res.status(status).json(errorResponse);
}
