/**
 * Result<T, E> type for functional error handling without exceptions.
 *
 * A Result is either:
 * - Ok: contains a success value of type T
 * - Err: contains an error value of type E
 *
 * This enables explicit error handling and makes error cases visible in type signatures.
 *
 * @example
 * ```typescript
 * function divide(a: number, b: number): Result<number> {
 *   if (b === 0) {
 *     return Err(new Error("Division by zero"));
 *   }
 *   return Ok(a / b);
 * }
 * ```
 *
 * @module result
 */

import { ErrState, OkState, ResultState, ResultTuple } from '../types/result';
import { describeError, describeValue } from '../utils/errors';
import { UnwrapError } from './UnwrapError';

export class Result<T, E = Error> {
  private constructor(private readonly state: ResultState<T, E>) {}

  /**
   * Create a successful Result containing a value.
   */
  static ok<T, E = Error>(value: T): Result<T, E> {
    const state: OkState<T> = { ok: true, value };
    return new Result<T, E>(Object.freeze(state));
  }

  /**
   * Create a successful Result that carries no meaningful value.
   */
  static okZero<E = Error>(): Result<undefined, E> {
    return Result.ok<undefined, E>(undefined);
  }

  /**
   * Create a failed Result containing an error.
   */
  static err<T, E = Error>(error: E): Result<T, E> {
    const state: ErrState<E> = { ok: false, error };
    return new Result<T, E>(Object.freeze(state));
  }

  isOk(): boolean {
    return this.state.ok;
  }

  isErr(): boolean {
    return !this.state.ok;
  }

  /**
   * Extract both slots at once. The error slot is `undefined` when Ok and the
   * value slot is `undefined` when Err.
   *
   * When `E` may itself be `undefined`, `Err(undefined)` and `OkZero()` both
   * yield `[undefined, undefined]`; check `isErr()` instead of the tuple.
   */
  unwrap(): ResultTuple<T, E> {
    if (this.state.ok) {
      return [this.state.value, undefined];
    }
    return [undefined, this.state.error];
  }

  /**
   * Return the contained value, or throw an UnwrapError carrying the stored
   * error as its `cause`.
   */
  unwrapUnsafe(): T {
    if (!this.state.ok) {
      throw new UnwrapError(`result is error: ${describeError(this.state.error)}`, {
        cause: this.state.error,
      });
    }
    return this.state.value;
  }

  unwrapOr(defaultValue: T): T {
    return this.state.ok ? this.state.value : defaultValue;
  }

  unwrapOrElse(producer: () => T): T {
    return this.state.ok ? this.state.value : producer();
  }

  unwrapOrDefault(): T | undefined {
    return this.state.ok ? this.state.value : undefined;
  }

  or(other: Result<T, E>): Result<T, E> {
    return this.state.ok ? this : other;
  }

  orElse(producer: () => Result<T, E>): Result<T, E> {
    return this.state.ok ? this : producer();
  }

  /**
   * `other` if this is Ok, otherwise this result's error.
   */
  and<U>(other: Result<U, E>): Result<U, E> {
    return this.state.ok ? other : Result.err<U, E>(this.state.error);
  }

  /**
   * Run an independent step after a successful one. `producer` does not
   * receive the current value; use `map` or `match` to transform it.
   */
  andThen<U>(producer: () => U): Result<U, E> {
    return this.state.ok ? Result.ok<U, E>(producer()) : Result.err<U, E>(this.state.error);
  }

  map<U>(fn: (value: T) => U): Result<U, E> {
    return this.state.ok ? Result.ok<U, E>(fn(this.state.value)) : Result.err<U, E>(this.state.error);
  }

  /**
   * Always Ok: the error is replaced by `defaultValue`.
   */
  mapOr<U>(defaultValue: U, fn: (value: T) => U): Result<U, E> {
    return Result.ok<U, E>(this.state.ok ? fn(this.state.value) : defaultValue);
  }

  /**
   * Always Ok: the error is handed to `onErr` and its return value wrapped.
   */
  mapOrElse<U>(onErr: (error: E) => U, onOk: (value: T) => U): Result<U, E> {
    return Result.ok<U, E>(this.state.ok ? onOk(this.state.value) : onErr(this.state.error));
  }

  match<U>(onOk: (value: T) => Result<U, E>, onErr: (error: E) => Result<U, E>): Result<U, E> {
    return this.state.ok ? onOk(this.state.value) : onErr(this.state.error);
  }

  toString(): string {
    return this.state.ok
      ? `Ok(${describeValue(this.state.value)})`
      : `Err(${describeError(this.state.error)})`;
  }
}

/**
 * Placeholder success for call sites where only the Ok/Err state matters.
 */
export const OkAny: Result<unknown> = Result.ok<unknown>(undefined);

export function Ok<T, E = Error>(value: T): Result<T, E> {
  return Result.ok<T, E>(value);
}

export function OkZero<E = Error>(): Result<undefined, E> {
  return Result.okZero<E>();
}

export function Err<T, E = Error>(error: E): Result<T, E> {
  return Result.err<T, E>(error);
}
