/**
 * Case-insensitive keys for nicks, channels and masks.
 *
 * IRC identifiers compare without regard to ASCII case, but the casing a
 * name was first seen with is kept for display. Composite keys such as
 * `[server, channel]` fold every part.
 */

export type ChanopKey = string | readonly string[];

// NUL cannot appear in server, channel or nick names.
const KEY_PART_SEPARATOR = "\u0000";

export function foldCase(value: string): string {
  return value.replace(/[A-Z]/g, (char) => char.toLowerCase());
}

export function normalizeKey(key: ChanopKey): string {
  if (typeof key === "string") {
    return foldCase(key);
  }
  return key.map((part) => foldCase(part)).join(KEY_PART_SEPARATOR);
}

export function equalsIgnoreCase(a: string, b: string): boolean {
  return foldCase(a) === foldCase(b);
}

export class CaseInsensitiveMap<K extends ChanopKey, V> implements Iterable<[K, V]> {
  private readonly entriesByKey = new Map<string, { key: K; value: V }>();

  constructor(entries?: Iterable<readonly [K, V]>) {
    if (entries) {
      for (const [key, value] of entries) {
        this.set(key, value);
      }
    }
  }

  get size(): number {
    return this.entriesByKey.size;
  }

  get(key: K): V | undefined {
    return this.entriesByKey.get(normalizeKey(key))?.value;
  }

  has(key: K): boolean {
    return this.entriesByKey.has(normalizeKey(key));
  }

  /** Keeps the casing of the first insertion when the key already exists. */
  set(key: K, value: V): this {
    const normalized = normalizeKey(key);
    const existing = this.entriesByKey.get(normalized);
    if (existing) {
      existing.value = value;
    } else {
      this.entriesByKey.set(normalized, { key, value });
    }
    return this;
  }

  /** Like `set`, but the given casing replaces the stored one. */
  setWithCasing(key: K, value: V): this {
    this.entriesByKey.set(normalizeKey(key), { key, value });
    return this;
  }

  delete(key: K): boolean {
    return this.entriesByKey.delete(normalizeKey(key));
  }

  clear(): void {
    this.entriesByKey.clear();
  }

  *keys(): IterableIterator<K> {
    for (const entry of this.entriesByKey.values()) {
      yield entry.key;
    }
  }

  *values(): IterableIterator<V> {
    for (const entry of this.entriesByKey.values()) {
      yield entry.value;
    }
  }

  *entries(): IterableIterator<[K, V]> {
    for (const entry of this.entriesByKey.values()) {
      yield [entry.key, entry.value];
    }
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries();
  }
}

export class CaseInsensitiveSet<K extends ChanopKey> implements Iterable<K> {
  private readonly map = new CaseInsensitiveMap<K, true>();

  constructor(values?: Iterable<K>) {
    if (values) {
      for (const value of values) {
        this.add(value);
      }
    }
  }

  get size(): number {
    return this.map.size;
  }

  has(value: K): boolean {
    return this.map.has(value);
  }

  add(value: K): this {
    this.map.set(value, true);
    return this;
  }

  delete(value: K): boolean {
    return this.map.delete(value);
  }

  clear(): void {
    this.map.clear();
  }

  values(): IterableIterator<K> {
    return this.map.keys();
  }

  [Symbol.iterator](): IterableIterator<K> {
    return this.map.keys();
  }
}
