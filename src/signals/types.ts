/**
 * Value types - constraints checked on every value a signal takes.
 */

import { z } from "zod/v4";
import { TypeMismatchError } from "./errors.js";

/**
 * A constraint on the values a signal may hold, expressed as a zod schema.
 *
 * @example
 * const count = signalVariable(0, { type: z.int().nonnegative() });
 * count.value = -1; // throws TypeMismatchError
 */
export type ValueType<T> = z.ZodType<T>;

/** Accepts every value of the signal's static type. */
export const anyValue = <T>(): ValueType<T> => z.custom<T>();

/**
 * Check `value` against `type` and return it unchanged.
 *
 * The schema's parsed output is discarded: a signal stores exactly what it
 * was given, so transforming or coercing schemas never rewrite a value.
 */
export function checkValue<T>(type: ValueType<T>, value: T, label: string): T {
  const result = type.safeParse(value);
  if (!result.success) {
    throw new TypeMismatchError(label, value, result.error.issues);
  }
  return value;
}
