/**
 * Error kinds surfaced by the catalog core. The HTTP error middleware maps
 * each to its status code; anything that is not an AppError becomes a 500.
 */

export type ErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "GATEWAY_ERROR"
  | "STORAGE_ERROR"
  | "UNAUTHORIZED";

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: ErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, statusCode: number, code: ErrorCode, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, "VALIDATION_ERROR", details);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 404, "NOT_FOUND", details);
  }
}

/**
 * Upstream place lookup failure. 400 when the upstream rejected the request
 * (bad key, invalid query), 502 for outages, timeouts and upstream 5xx.
 * The upstream message is passed through to the client.
 */
export class GatewayError extends AppError {
  constructor(message: string, statusCode: 400 | 502 = 502, details?: Record<string, unknown>) {
    super(message, statusCode, "GATEWAY_ERROR", details);
  }
}

export class StorageError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 500, "STORAGE_ERROR", details);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = "Missing or invalid API key") {
    super(message, 401, "UNAUTHORIZED");
  }
}
