/**
 * Type guard for checking if a value is an Error instance with a message
 */
export function isErrorWithMessage(error: unknown): error is Error & { message: string } {
  return error instanceof Error && typeof error.message === 'string';
}

/**
 * Extract a printable message from an unknown thrown value
 */
export function getErrorMessage(error: unknown, defaultMessage?: string): string {
  if (isErrorWithMessage(error)) {
    return error.message;
  }
  return defaultMessage || String(error);
}

/**
 * Type guard for plain objects (not null, not arrays)
 */
export function isObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Type guard for Node-style system errors (`ENOENT`, `EACCES`, ...)
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return isObject(error) && 'code' in error && error['code'] === code;
}
