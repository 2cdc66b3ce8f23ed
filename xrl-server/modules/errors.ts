import express from "express";
import { logDebug, logError } from "./logger.js";

/**
 * Error carrying the HTTP status it should be reported with.
 */
export class HttpError extends Error {
  readonly status: number;

  constructor(status: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.status = status;
  }
}

/** Missing or malformed input from the caller. */
export class BadRequestError extends HttpError {
  constructor(message: string) {
    super(400, message);
  }
}

export class NotFoundError extends HttpError {
  constructor(message = "Not found") {
    super(404, message);
  }
}

/** A page fetch or browser render that failed or timed out. */
export class UpstreamError extends HttpError {
  constructor(message: string, cause?: unknown) {
    super(502, message, { cause });
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** ENOENT-style failures from fs, or a 404 from Express' file sending. */
export function isMissingFileError(error: unknown): boolean {
  // fs errors can come from another realm (vm contexts), so no instanceof
  if (typeof error !== "object" || error === null) return false;
  if ("code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
    return true;
  }
  return "status" in error && error.status === 404;
}

type AsyncHandler = (
  req: express.Request,
  res: express.Response,
  next: express.NextFunction
) => Promise<void>;

/**
 * Adapt an async route handler so rejections reach the error middleware.
 */
export function asyncRoute(handler: AsyncHandler): express.RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}

export const notFoundHandler: express.RequestHandler = (req, _res, next) => {
  next(new NotFoundError(`No route for ${req.method} ${req.path}`));
};

export const errorHandler: express.ErrorRequestHandler = (
  err: unknown,
  req,
  res,
  next
) => {
  if (res.headersSent) {
    next(err);
    return;
  }

  if (err instanceof HttpError) {
    if (err.status >= 500) {
      logError(`${req.method} ${req.originalUrl} failed:`, err.message);
    } else {
      logDebug(`${req.method} ${req.originalUrl} -> ${err.status}: ${err.message}`);
    }
    res.status(err.status).json({ error: err.message });
    return;
  }

  logError(`Unhandled error on ${req.method} ${req.originalUrl}:`, err);
  res.status(500).json({
    error: err instanceof Error ? err.message : "Unknown error occurred",
  });
};
