/**
 * Error Utilities
 *
 * Safe error classification and message extraction.
 */

/**
 * Read the `code` property of a Node.js system error, if any.
 */
export function getErrorCode(err: unknown): string | undefined {
  if (err && typeof err === "object" && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Check if an error is a "file not found" error (ENOENT).
 */
export function isNotFoundError(err: unknown): boolean {
  return getErrorCode(err) === "ENOENT";
}

/**
 * Safely extract a message string from an unknown error value.
 */
export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  if (typeof err === "string") {
    return err;
  }
  return String(err);
}
