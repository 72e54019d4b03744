/**
 * Error Handler Middleware
 * Centralized error handling for Express application.
 */

import type { Request, Response, NextFunction } from "express";
import { AppError } from "../utils/errors.js";

/** Shape of body-parser failures (malformed JSON, oversized body). */
interface HttpStatusError extends Error {
  status?: number;
  expose?: boolean;
}

function statusOf(error: HttpStatusError): number {
  if (error instanceof AppError) {
    return error.statusCode;
  }
  if (error.expose && error.status && error.status >= 400 && error.status < 500) {
    return error.status;
  }
  return 500;
}

/**
 * Global error handler middleware.
 * Answers `{ detail }` with the error's status, 500 for anything unexpected.
 * Outside production, server errors also carry their stack trace.
 * MUST be registered last in middleware chain.
 */
export function createErrorHandler(nodeEnv: string) {
  return function errorHandler(
    error: HttpStatusError,
    req: Request,
    res: Response,
    next: NextFunction
  ): void {
    const statusCode = statusOf(error);
    const message = statusCode === 500 && !(error instanceof AppError)
      ? "Internal server error"
      : error.message || "Internal server error";

    console.error(`[Error] ${statusCode} - ${error.message}`, {
      error: error.name,
      stack: statusCode >= 500 ? error.stack : undefined,
      path: req.path,
      method: req.method,
    });

    if (res.headersSent) {
      next(error);
      return;
    }

    const response: { detail: string; stack?: string } = { detail: message };

    // Include stack trace in development
    if (statusCode >= 500 && nodeEnv !== "production") {
      response.stack = error.stack;
    }

    res.status(statusCode).json(response);
  };
}
