/**
 * Record helpers for maps keyed by extracted text.
 *
 * Room names, roles and exclusion reasons come from drawings and rule
 * payloads, so keys such as `constructor` or `__proto__` are ordinary data
 * here. Only own properties count as entries.
 */

export function getOwn<T>(record: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

/**
 * Append to a list in a Map, creating the list on first use
 */
export function appendTo<T>(map: Map<string, T[]>, key: string, value: T): void {
  const list = map.get(key);
  if (list) {
    list.push(value);
  } else {
    map.set(key, [value]);
  }
}

/**
 * Convert a Map to a plain record. Every key becomes an own data property,
 * `__proto__` included.
 */
export function toRecord<T>(map: ReadonlyMap<string, T>): Record<string, T> {
  return Object.fromEntries(map);
}
