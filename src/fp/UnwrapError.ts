/**
 * Thrown by `unwrapUnsafe()` when the container holds no value.
 *
 * This is a programming error, not a data error: do not catch it to recover.
 * Check the state first, or use one of the total extractors
 * (`unwrap`, `unwrapOr`, `unwrapOrElse`, `unwrapOrDefault`).
 */
export class UnwrapError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UnwrapError';
  }
}
