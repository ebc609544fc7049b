/**
 * Option<T>: a value that may be absent, without using a sentinel of T.
 *
 * Unlike `T | undefined`, an Option can hold `undefined`, `0` or `''` as a
 * real value and still be told apart from absence.
 *
 * @example
 * ```typescript
 * const port = Option.fromNullable(process.env.PORT)
 *   .map(Number)
 *   .unwrapOr(3456);
 * ```
 *
 * @module option
 */

import { NoneState, OptionState, OptionTuple, SomeState } from '../types/option';
import { describeValue } from '../utils/errors';
import { isZeroValue } from '../utils/zero';
import { Result } from './Result';
import { UnwrapError } from './UnwrapError';

const NONE_STATE: NoneState = Object.freeze<NoneState>({ some: false });

export class Option<T> {
  private constructor(private readonly state: OptionState<T>) {}

  /**
   * Create an Option in the Some state holding `value`.
   */
  static some<T>(value: T): Option<T> {
    const state: SomeState<T> = { some: true, value };
    return new Option<T>(Object.freeze(state));
  }

  /**
   * Create an Option in the None state.
   */
  static none<T>(): Option<T> {
    return new Option<T>(NONE_STATE);
  }

  /**
   * Adapt a `(value, present)` pair, as returned by lookups that report
   * absence through a side flag.
   */
  static fromTuple<T>(value: T, present: boolean): Option<T> {
    return present ? Option.some<T>(value) : Option.none<T>();
  }

  /**
   * None for `null` or `undefined`, Some otherwise.
   *
   * Objects are held by reference, not copied: mutating `value` afterwards
   * changes what the Option yields. Pass a copy when that matters.
   */
  static fromNullable<T>(value: T | null | undefined): Option<T> {
    if (value === null || value === undefined) {
      return Option.none();
    }
    return Option.some<T>(value);
  }

  /**
   * None when `value` is a zero value (`undefined`, `null`, `0`, `0n`, `''`,
   * `false`), Some otherwise.
   *
   * Lossy: a legitimate `0` becomes None. Use `fromTuple` when zero values
   * are meaningful.
   */
  static fromZeroValue<T>(value: T): Option<T> {
    if (isZeroValue(value)) {
      return Option.none();
    }
    return Option.some<T>(value);
  }

  isSome(): boolean {
    return this.state.some;
  }

  isNone(): boolean {
    return !this.state.some;
  }

  /**
   * Never throws. The value slot is `undefined` when the flag is false.
   */
  unwrap(): OptionTuple<T> {
    if (this.state.some) {
      return [this.state.value, true];
    }
    return [undefined, false];
  }

  unwrapOr(defaultValue: T): T {
    return this.state.some ? this.state.value : defaultValue;
  }

  /**
   * `producer` runs only when the option is None.
   */
  unwrapOrElse(producer: () => T): T {
    return this.state.some ? this.state.value : producer();
  }

  unwrapOrDefault(): T | undefined {
    return this.state.some ? this.state.value : undefined;
  }

  /**
   * Return the contained value, or throw an UnwrapError if None.
   *
   * Only for call sites that already know the option is Some.
   */
  unwrapUnsafe(): T {
    if (!this.state.some) {
      throw new UnwrapError('option is none');
    }
    return this.state.value;
  }

  or(other: Option<T>): Option<T> {
    return this.state.some ? this : other;
  }

  orElse(producer: () => Option<T>): Option<T> {
    return this.state.some ? this : producer();
  }

  map<U>(fn: (value: T) => U): Option<U> {
    if (this.state.some) {
      return Option.some(fn(this.state.value));
    }
    return Option.none();
  }

  /**
   * Returns the bare value, not an Option.
   */
  mapOr<U>(defaultValue: U, fn: (value: T) => U): U {
    return this.state.some ? fn(this.state.value) : defaultValue;
  }

  mapOrElse<U>(onNone: () => U, onSome: (value: T) => U): U {
    return this.state.some ? onSome(this.state.value) : onNone();
  }

  match<U>(onSome: (value: T) => Option<U>, onNone: () => Option<U>): Option<U> {
    return this.state.some ? onSome(this.state.value) : onNone();
  }

  okOr<E>(error: E): Result<T, E> {
    return this.state.some ? Result.ok<T, E>(this.state.value) : Result.err<T, E>(error);
  }

  okOrElse<E>(producer: () => E): Result<T, E> {
    return this.state.some ? Result.ok<T, E>(this.state.value) : Result.err<T, E>(producer());
  }

  toString(): string {
    return this.state.some ? `Some(${describeValue(this.state.value)})` : 'None';
  }
}

export function Some<T>(value: T): Option<T> {
  return Option.some(value);
}

export function None<T>(): Option<T> {
  return Option.none();
}

export function optionFromTuple<T>(value: T, present: boolean): Option<T> {
  return Option.fromTuple(value, present);
}

export function optionFromNullable<T>(value: T | null | undefined): Option<T> {
  return Option.fromNullable(value);
}

export function optionFromZero<T>(value: T): Option<T> {
  return Option.fromZeroValue(value);
}
