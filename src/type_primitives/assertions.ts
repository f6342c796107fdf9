/***
 * Assertions — Dev-only runtime validation and branded casting.
 *
 * Checks are guarded by __DEV__ and stripped from production builds.
 * validate_and_cast is how branded ids are minted: it validates the raw
 * number in dev and hands it back as the branded type. unsafe_cast skips
 * every check and is reserved for values whose type the caller already
 * guarantees (a column looked up by its own ComponentID, for instance).
 *
 ***/

import { TYPE_ERROR, TypeError } from "./error";

export const is_non_negative_integer = (v: number): boolean =>
  Number.isInteger(v) && v >= 0;

export const is_u32 = (v: number): boolean =>
  is_non_negative_integer(v) && v <= 0xffffffff;

export function validate_and_cast<T, Result extends T = T>(
  value: T,
  validator: (v: T) => boolean,
  err_message: string,
): Result {
  if (__DEV__ && !validator(value)) {
    throw new TypeError(
      TYPE_ERROR.VALIDATION_FAIL_CONDITION,
      `Expected value to meet validation: ${err_message}`,
      { value },
    );
  }
  return value as Result;
}

export function unsafe_cast<T>(value: unknown): T {
  return value as T;
}
