import { StorageError } from "../domain/errors";

export const isUniqueViolation = (err: unknown): boolean =>
  err instanceof Error && err.message.includes("UNIQUE constraint failed");

/**
 * Wrap a driver error so the original message stays in logs (details) but
 * never reaches the client.
 */
export const toStorageError = (err: unknown, operation: string): StorageError =>
  new StorageError("Database operation failed", {
    operation,
    originalError: err instanceof Error ? err.message : String(err),
  });
