import type { NextFunction, Request, RequestHandler, Response } from "express";
import { timingSafeEqual } from "node:crypto";
import { UnauthorizedError } from "../domain/errors";

export const API_KEY_HEADER = "X-API-Key";

// Health probes and the root stay open
const EXEMPT_PATHS = new Set(["/", "/health"]);

const keysMatch = (provided: string, expected: string): boolean => {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
};

/**
 * Require a matching X-API-Key header on every non-exempt request. With no
 * key configured the check is skipped (local development).
 */
export function requireApiKey(expectedKey: string): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    if (!expectedKey || EXEMPT_PATHS.has(req.path)) {
      next();
      return;
    }

    const provided = req.get(API_KEY_HEADER) ?? "";
    if (keysMatch(provided, expectedKey)) {
      next();
      return;
    }

    next(new UnauthorizedError());
  };
}
