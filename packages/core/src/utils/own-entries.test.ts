import { describe, it, expect } from 'vitest';
import { getOwnEntry, setOwnEntry } from './own-entries.js';

describe('setOwnEntry', () => {
  it('stores __proto__ as a regular key', () => {
    const record: Record<string, number> = {};
    setOwnEntry(record, '__proto__', 1);

    expect(Object.keys(record)).toEqual(['__proto__']);
    expect(Object.getPrototypeOf(record)).toBe(Object.prototype);
    expect(getOwnEntry(record, '__proto__')).toBe(1);
  });

  it('overwrites an existing key in place', () => {
    const record: Record<string, number> = { a: 1, b: 2 };
    setOwnEntry(record, 'a', 3);

    expect(record).toEqual({ a: 3, b: 2 });
    expect(Object.keys(record)).toEqual(['a', 'b']);
  });
});

describe('getOwnEntry', () => {
  it('ignores inherited members', () => {
    const record: Record<string, string[]> = { data: ['weather'] };

    expect(getOwnEntry(record, 'data')).toEqual(['weather']);
    expect(getOwnEntry(record, 'toString')).toBeUndefined();
    expect(getOwnEntry(record, 'constructor')).toBeUndefined();
  });
});
