/**
 * Recursively freezes plain objects and arrays in place.
 */
export function deepFreeze<T>(value: T): Readonly<T> {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    const children: unknown[] = Object.values(value);
    for (const child of children) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Frozen deep copy, leaving the caller's object untouched.
 */
export function frozenCopy<T>(value: T): Readonly<T> {
  return deepFreeze(structuredClone(value));
}
