/**
 * Structural equality, the default test used by `onChange`.
 */

/** An equality test between two values of a signal. */
export type Equality<T> = (a: T, b: T) => boolean;

/**
 * Compare two values structurally.
 *
 * Primitives compare with `Object.is` (so `NaN` equals `NaN`), functions by
 * reference. Arrays, plain objects, `Date`, `Map` and `Set` compare by
 * content: map keys are looked up by identity, set members are matched
 * structurally. Other class instances compare by their own enumerable keys
 * only when both share a prototype. Cyclic structures are supported.
 */
export function deepEqual(a: unknown, b: unknown): boolean {
  return equals(a, b, new Map());
}

function equals(a: unknown, b: unknown, seen: Map<object, object>): boolean {
  if (Object.is(a, b)) return true;
  if (
    typeof a !== "object" ||
    typeof b !== "object" ||
    a === null ||
    b === null ||
    Object.getPrototypeOf(a) !== Object.getPrototypeOf(b)
  ) {
    return false;
  }

  // A pair already under comparison is assumed equal; any difference will
  // show up elsewhere in the walk.
  if (seen.get(a) === b) return true;
  seen.set(a, b);

  if (a instanceof Date && b instanceof Date) {
    return Object.is(a.getTime(), b.getTime());
  }

  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
      if (!equals(a[i], b[i], seen)) return false;
    }
    return true;
  }

  if (a instanceof Map && b instanceof Map) {
    if (a.size !== b.size) return false;
    for (const [key, value] of a) {
      if (!b.has(key) || !equals(value, b.get(key), seen)) return false;
    }
    return true;
  }

  if (a instanceof Set && b instanceof Set) {
    if (a.size !== b.size) return false;
    const unmatched = [...b].filter((item) => !a.has(item));
    for (const item of a) {
      if (b.has(item)) continue;
      // A failed attempt must not leave assumed-equal pairs behind
      const i = unmatched.findIndex((other) =>
        equals(item, other, new Map(seen)),
      );
      if (i < 0) return false;
      unmatched.splice(i, 1);
    }
    return true;
  }

  const keysA = Object.keys(a);
  const keysB = Object.keys(b);
  if (keysA.length !== keysB.length) return false;
  for (const key of keysA) {
    if (
      !Object.prototype.hasOwnProperty.call(b, key) ||
      !equals(Reflect.get(a, key), Reflect.get(b, key), seen)
    ) {
      return false;
    }
  }
  return true;
}
