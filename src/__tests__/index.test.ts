/**
 * Scenarios exercised through the public entry point.
 */

import { Err, None, Ok, Some, UnwrapError, filterMap, optionFromZero } from '..';

describe('option-result', () => {
  it('should square only the even elements with filterMap', () => {
    expect(filterMap([1, 2, 3], (x) => (x % 2 === 0 ? Some(x * x) : None<number>()))).toEqual([4]);
  });

  it('should treat zero as absent in optionFromZero', () => {
    expect(optionFromZero(0).isNone()).toBe(true);
    expect(optionFromZero(5).unwrap()).toEqual([5, true]);
  });

  it('should round-trip Some through okOr into Ok', () => {
    const error = new Error('absent');

    expect(Some(1).okOr(error).unwrapUnsafe()).toBe(1);
    expect(None<number>().okOr(error).unwrap()).toEqual([undefined, error]);
  });

  it('should fault loudly on unsafe unwraps of empty containers', () => {
    expect(Ok(1).unwrapUnsafe()).toBe(1);
    const failed = Err<number>(new Error('boom'));

    expect(() => failed.unwrapUnsafe()).toThrow(UnwrapError);
    expect(() => failed.unwrapUnsafe()).toThrow('result is error: boom');
    expect(() => None<number>().unwrapUnsafe()).toThrow(UnwrapError);
  });

  it('should keep And on the original error and MapOr always Ok', () => {
    const error = new Error('first');

    expect(Ok(1).and(Ok(2)).unwrapUnsafe()).toBe(2);
    expect(Err<number>(error).and(Ok(2)).unwrap()).toEqual([undefined, error]);
    expect(Err<number>(error).mapOr(1, (x) => x + 1).unwrap()).toEqual([1, undefined]);
  });
});
