// src/middlewares/error.ts
import type { ErrorRequestHandler } from "express";
import { ZodError } from "zod";

import { logger } from "../config/logger.js";
import { AppError } from "../domain/errors.js";

export const errorHandler: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
  const requestId: unknown = res.locals.requestId;

  if (err instanceof ZodError) {
    const details = err.flatten();
    logger.warn("Validation error", { requestId, details });
    return res.status(422).json({
      error: { code: "UNPROCESSABLE_ENTITY", message: "Invalid request", requestId, details },
    });
  }

  if (err instanceof AppError) {
    const log = err.status >= 500 ? logger.error.bind(logger) : logger.warn.bind(logger);
    log(err.message, { requestId, status: err.status, code: err.code, ...err.details });
    return res.status(err.status).json({
      error: { code: err.code, message: err.message, requestId, ...err.details },
    });
  }

  // express.json() parse failures and the like carry a 4xx status
  const status = statusOf(err);
  if (status && status >= 400 && status < 500) {
    return res.status(status).json({
      error: { code: "BAD_REQUEST", message: err instanceof Error ? err.message : "Bad request", requestId },
    });
  }

  // always log stack if present
  logger.error(err instanceof Error ? err.message : "Unhandled error", {
    requestId,
    stack: err instanceof Error ? err.stack : undefined,
  });
  res.status(500).json({
    error: { code: "INTERNAL_ERROR", message: "Internal server error", requestId },
  });
};

function statusOf(err: unknown): number | null {
  if (typeof err !== "object" || err === null || !("status" in err)) return null;
  return typeof err.status === "number" ? err.status : null;
}
