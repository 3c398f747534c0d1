/**
 * Map keyed by value rather than identity.
 *
 * Dynamic collection keys are often structs (`{ name }`, `{ vertex, port }`).
 * Two keys are the same key when {@link canonicalKey} renders them to the same
 * string: object fields are sorted, `bigint`, byte arrays, `Map` and `Set`
 * each have their own form.
 *
 * @module
 */

import { bytesToHex } from "../utils/encoding.js";

/** Stable text form of a decoded key. */
export function canonicalKey(value: unknown): string {
  if (value === undefined) return "undefined";
  if (value === null || typeof value === "boolean" || typeof value === "string") return JSON.stringify(value);
  if (typeof value === "number") return Number.isNaN(value) ? "NaN" : String(value);
  if (typeof value === "bigint") return `${value}n`;
  if (value instanceof Uint8Array) return `bytes(${bytesToHex(value)})`;
  if (Array.isArray(value)) return `[${value.map(canonicalKey).join(",")}]`;
  if (value instanceof Set) return `set[${[...value].map(canonicalKey).sort().join(",")}]`;
  if (value instanceof Map) {
    const pairs = [...value].map(([k, v]) => `${canonicalKey(k)}:${canonicalKey(v)}`);
    return `map{${pairs.sort().join(",")}}`;
  }
  if (typeof value === "object") {
    const fields = Object.entries(value)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}:${canonicalKey(v)}`);
    return `{${fields.join(",")}}`;
  }
  throw new TypeError(`Cannot use a ${typeof value} as a collection key`);
}

export class ValueMap<K, V> implements Iterable<[K, V]> {
  private readonly byKey = new Map<string, [K, V]>();

  constructor(entries?: Iterable<readonly [K, V]>) {
    if (entries !== undefined) {
      for (const [key, value] of entries) this.set(key, value);
    }
  }

  get size(): number {
    return this.byKey.size;
  }

  get(key: K): V | undefined {
    return this.byKey.get(canonicalKey(key))?.[1];
  }

  has(key: K): boolean {
    return this.byKey.has(canonicalKey(key));
  }

  /** Insertion order is kept; setting an existing key keeps its first key object. */
  set(key: K, value: V): this {
    const id = canonicalKey(key);
    const existing = this.byKey.get(id);
    this.byKey.set(id, [existing === undefined ? key : existing[0], value]);
    return this;
  }

  delete(key: K): boolean {
    return this.byKey.delete(canonicalKey(key));
  }

  *keys(): IterableIterator<K> {
    for (const [key] of this.byKey.values()) yield key;
  }

  *values(): IterableIterator<V> {
    for (const [, value] of this.byKey.values()) yield value;
  }

  *entries(): IterableIterator<[K, V]> {
    for (const [key, value] of this.byKey.values()) yield [key, value];
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries();
  }
}
