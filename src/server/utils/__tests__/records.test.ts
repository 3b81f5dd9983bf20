import { describe, it, expect } from 'vitest';
import { appendTo, getOwn, toRecord } from '../records.js';

describe('records', () => {
  it('ignores keys inherited from Object.prototype', () => {
    const counts: Record<string, number> = { CLASSE: 2 };

    expect(getOwn(counts, 'CLASSE')).toBe(2);
    expect(getOwn(counts, 'constructor')).toBeUndefined();
    expect(getOwn(counts, 'toString')).toBeUndefined();
  });

  it('keeps every Map key as an own property', () => {
    const ids = new Map<string, string[]>();
    appendTo(ids, '__proto__', 'room_a');
    appendTo(ids, 'constructor', 'room_b');
    appendTo(ids, 'constructor', 'room_c');

    const record = toRecord(ids);

    expect(Object.keys(record)).toEqual(['__proto__', 'constructor']);
    expect(getOwn(record, '__proto__')).toEqual(['room_a']);
    expect(getOwn(record, 'constructor')).toEqual(['room_b', 'room_c']);
    expect(Object.getPrototypeOf(record)).toBe(Object.prototype);
  });
});
