export type { OptionState, OptionTuple, SomeState, NoneState } from './types/option';
export type { ResultState, ResultTuple, OkState, ErrState } from './types/result';

export {
  Option,
  Some,
  None,
  optionFromTuple,
  optionFromNullable,
  optionFromZero,
} from './fp/Option';
export { Result, Ok, OkAny, OkZero, Err } from './fp/Result';
export { UnwrapError } from './fp/UnwrapError';

export { filterMap, filterMapEntries, find, at, getEntry } from './utils/collections';
export { parseWith, formatIssues, ValidationError } from './utils/validation';
export { describeError, describeValue } from './utils/errors';
export { isZeroValue } from './utils/zero';
export type { ZeroValue } from './utils/zero';
