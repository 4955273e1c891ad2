/**
 * Helpers shared by the converters. Optional fields are emitted only when
 * they carry something: an empty list or map counts as absent.
 */

export function hasItems<T>(value: readonly T[] | undefined): value is readonly T[] {
  return value !== undefined && value.length > 0;
}

export function hasEntries<T>(
  value: Readonly<Record<string, T>> | undefined,
): value is Readonly<Record<string, T>> {
  return value !== undefined && Object.keys(value).length > 0;
}
