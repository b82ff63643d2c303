/**
 * Helpers for working with opaque failure values
 */

/**
 * Human-readable description of any thrown value
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message ? `${error.name}: ${error.message}` : error.name;
  }

  if (typeof error === 'string') {
    return error;
  }

  if (error === null || error === undefined) {
    return String(error);
  }

  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}

/**
 * Normalize a thrown value into an Error for log entries
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(describeError(error));
}

/**
 * Read the `code` property Node attaches to system errors (EBUSY, ENOENT, ...)
 */
export function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return undefined;
  }

  const { code } = error;
  return typeof code === 'string' ? code : undefined;
}
