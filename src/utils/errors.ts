/**
 * Render any value as text without throwing. Values `String()` cannot
 * convert (null-prototype objects, a throwing `toString`) fall back to their
 * `[object Tag]` form.
 */
export function describeValue(value: unknown): string {
  try {
    return String(value);
  } catch {
    return Object.prototype.toString.call(value);
  }
}

/**
 * Render any thrown or stored error as a single line of text.
 *
 * @example
 * ```typescript
 * describeError(new Error("disk full")); // "disk full"
 * describeError("timeout");              // "timeout"
 * describeError(404);                    // "404"
 * ```
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return describeValue(error);
}
