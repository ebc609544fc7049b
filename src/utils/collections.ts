/**
 * Sequence and map helpers whose contract is expressed through Option.
 *
 * @module collections
 */

import { Option } from '../fp/Option';

/**
 * Keep the values of every Some returned by `fn`, in input order.
 *
 * @example
 * ```typescript
 * filterMap([1, 2, 3], (x) => (x % 2 === 0 ? Some(x * x) : None())); // [4]
 * ```
 */
export function filterMap<T, U>(
  items: readonly T[],
  fn: (item: T, index: number) => Option<U>
): U[] {
  const res: U[] = [];

  items.forEach((item, index) => {
    const [value, present] = fn(item, index).unwrap();
    if (present) {
      res.push(value);
    }
  });

  return res;
}

/**
 * Build a new Map from the entries for which `fn` returns Some([key, value]).
 * Later entries win when two of them map to the same key.
 */
export function filterMapEntries<K1, V1, K2, V2>(
  map: ReadonlyMap<K1, V1>,
  fn: (key: K1, value: V1) => Option<[K2, V2]>
): Map<K2, V2> {
  const res = new Map<K2, V2>();

  for (const [key, value] of map) {
    const [entry, present] = fn(key, value).unwrap();
    if (present) {
      res.set(entry[0], entry[1]);
    }
  }

  return res;
}

/**
 * First element matching `predicate`. A matching `undefined` element is still Some.
 */
export function find<T>(
  items: readonly T[],
  predicate: (item: T, index: number) => boolean
): Option<T> {
  const index = items.findIndex(predicate);
  return Option.fromTuple(items[index], index >= 0);
}

/**
 * Element at `index`, or None when out of range. Negative indexes are out of range.
 */
export function at<T>(items: readonly T[], index: number): Option<T> {
  const inRange = Number.isInteger(index) && index >= 0 && index < items.length;
  return Option.fromTuple(items[index], inRange);
}

/**
 * Value stored under `key`, or None when the key is missing. A stored
 * `undefined` is still Some.
 */
export function getEntry<K, V>(map: ReadonlyMap<K, V>, key: K): Option<V> {
  if (!map.has(key)) {
    return Option.none();
  }
  // has() guarantees the entry; get() cannot express that in its type
  return Option.some(map.get(key) as V);
}
