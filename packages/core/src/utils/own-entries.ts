/**
 * Sets `record[key]` as an own enumerable property. Plain assignment to
 * `__proto__` would replace the prototype instead of adding a key.
 */
export function setOwnEntry<T>(record: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(record, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

/**
 * Own-property lookup; inherited members such as `toString` are not entries.
 */
export function getOwnEntry<T>(record: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}
