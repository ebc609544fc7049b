/**
 * Values treated as "unset" by `Option.fromZeroValue`.
 *
 * TypeScript has no per-type default, so this mirrors what an uninitialised
 * slot of each primitive type would hold. NaN, objects and arrays are never
 * zero.
 */
export type ZeroValue = undefined | null | 0 | 0n | '' | false;

export function isZeroValue(value: unknown): value is ZeroValue {
  return (
    value === undefined ||
    value === null ||
    value === 0 ||
    value === 0n ||
    value === '' ||
    value === false
  );
}
