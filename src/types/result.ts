/**
 * State types backing Result<T, E>.
 *
 * A Result is either:
 * - Ok: contains a success value of type T
 * - Err: contains an error value of type E
 *
 * The discriminant decides the state, not the error slot, so an Err holding
 * `undefined` is still an Err.
 *
 * @example
 * ```typescript
 * const state: ResultState<number, Error> = { ok: true, value: 42 };
 * ```
 */

/**
 * Success variant of ResultState<T, E>
 */
export interface OkState<T> {
  readonly ok: true;
  readonly value: T;
}

/**
 * Error variant of ResultState<T, E>
 */
export interface ErrState<E> {
  readonly ok: false;
  readonly error: E;
}

/**
 * Either OkState<T> or ErrState<E>
 */
export type ResultState<T, E> = OkState<T> | ErrState<E>;

/**
 * Tuple returned by `Result.unwrap()`. Exactly one slot is meaningful.
 */
export type ResultTuple<T, E> = [value: T, error: undefined] | [value: undefined, error: E];
