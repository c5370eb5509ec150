import type { NextFunction, Request, RequestHandler, Response } from "express";
import type { Logger } from "pino";
import { randomUUID } from "node:crypto";
import { AppError } from "../domain/errors";

const INTERNAL_MESSAGE = "An internal server error occurred";

export const REQUEST_ID_HEADER = "X-Request-Id";

export function requestId(res: Response): string {
  const value: unknown = res.locals.requestId;
  return typeof value === "string" ? value : "unknown";
}

/**
 * Tags each request with an id (client-supplied X-Request-Id or a fresh
 * UUID) and logs one line per completed request.
 */
export function requestLogger(logger: Logger): RequestHandler {
  const log = logger.child({ module: "http" });

  return (req: Request, res: Response, next: NextFunction) => {
    const startedAt = Date.now();
    const incoming = req.get(REQUEST_ID_HEADER)?.trim();
    const id = incoming || randomUUID();
    res.locals.requestId = id;
    res.setHeader(REQUEST_ID_HEADER, id);

    res.on("finish", () => {
      log.info(
        {
          requestId: id,
          method: req.method,
          path: req.path,
          statusCode: res.statusCode,
          durationMs: Date.now() - startedAt,
        },
        "request.completed",
      );
    });

    next();
  };
}

/** Forward rejected promises from async route handlers to the error middleware. */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>,
): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    error: "NOT_FOUND",
    message: `Route ${req.method} ${req.path} not found`,
  });
}

/**
 * AppError subclasses keep their status and message; everything else is a
 * 500 with a generic message and the detail only in the log.
 */
export function errorHandler(logger: Logger) {
  const log = logger.child({ module: "http-errors" });

  // Express recognises error middleware by its four-argument signature
  return (error: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(error);
      return;
    }

    const id = requestId(res);

    if (error instanceof AppError) {
      const logFields = {
        requestId: id,
        method: req.method,
        path: req.path,
        code: error.code,
        details: error.details,
      };
      if (error.statusCode >= 500) {
        log.error({ ...logFields, err: error }, error.message);
      } else {
        log.warn(logFields, error.message);
      }

      const message = error.statusCode >= 500 && error.code === "STORAGE_ERROR" ? INTERNAL_MESSAGE : error.message;
      res.status(error.statusCode).json({ error: error.code, message });
      return;
    }

    // Malformed JSON bodies from express.json()
    if (error instanceof SyntaxError && "status" in error && error.status === 400) {
      log.warn({ requestId: id, method: req.method, path: req.path }, "Malformed JSON body");
      res.status(400).json({ error: "VALIDATION_ERROR", message: "Request body must be valid JSON" });
      return;
    }

    log.error({ requestId: id, method: req.method, path: req.path, err: error }, "Unhandled error");
    res.status(500).json({ error: "INTERNAL_ERROR", message: INTERNAL_MESSAGE });
  };
}
