/**
 * Type guard to check if a value is a plain object record.
 *
 * @param value - The value to check
 * @returns True if the value is a non-null object and not an array
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
