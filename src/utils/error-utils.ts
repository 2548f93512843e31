/**
 * Extracts a string message from any error value.
 * Handles Error instances, strings, numbers, null, undefined, and objects.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
