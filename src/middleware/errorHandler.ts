/**
 * Global error handling middleware.
 *
 * Single place where failures become HTTP responses: the error is logged
 * with its type and metadata, and the client receives its string form as a
 * plain-text body with the error's status code (500 for pipeline failures).
 */
import type { NextFunction, Request, Response } from "express";

import { logger } from "@infrastructure/logging/Logger";
import { AppError, describeError, isAppError } from "@typesLocal/AppError";

export function toAppError(err: unknown): AppError {
  if (isAppError(err)) {
    return err;
  }

  // body-parser errors carry their own 4xx status (e.g. 413 payload too large).
  const status =
    err && typeof err === "object" && "status" in err && typeof err.status === "number"
      ? err.status
      : 500;

  return new AppError(describeError(err).message || "Internal Server Error", "AppError", {
    statusCode: status,
    cause: err,
  });
}

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const appError = toAppError(err);

  logger.log(appError.statusCode >= 500 ? "error" : "warn", "Request failed", {
    method: req.method,
    path: req.path,
    type: appError.type,
    statusCode: appError.statusCode,
    message: appError.message,
    metadata: appError.metadata ? JSON.stringify(appError.metadata) : undefined,
    originalError: appError === err ? undefined : String(err),
  });

  if (res.headersSent) {
    return;
  }

  res.status(appError.statusCode).type("text/plain").send(String(appError));
}
