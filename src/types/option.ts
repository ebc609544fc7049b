/**
 * State types backing Option<T>.
 *
 * @module option
 */

/**
 * Present variant of OptionState<T>
 */
export interface SomeState<T> {
  readonly some: true;
  readonly value: T;
}

/**
 * Absent variant of OptionState<T>. Carries no value slot at all.
 */
export interface NoneState {
  readonly some: false;
}

export type OptionState<T> = SomeState<T> | NoneState;

/**
 * Tuple returned by `Option.unwrap()`; the flag must be checked before the value is used.
 */
export type OptionTuple<T> = [value: T, present: true] | [value: undefined, present: false];
