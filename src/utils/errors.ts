/**
 * Message of a caught value. Errors raised by Node's own modules may come
 * from another realm and fail `instanceof Error`, so any object with a
 * string `message` counts.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}
