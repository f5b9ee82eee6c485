// src/types.ts

/**
 * A structured state value as carried by a state update.
 * The variant is told apart by `typeof` and `Array.isArray`.
 */
export type Value = null | boolean | number | string | Value[] | ValueMapping;

export interface ValueMapping {
  [key: string]: Value;
}

/**
 * A diff against a key/value state.
 *
 * A `null` under an update key is the deletion sentinel. `removals` is
 * carried along but not consulted when aggregating.
 */
export interface Change {
  updates: Record<string, Value>;
  removals: Set<string>;
}

/**
 * Cumulative key/value state after folding a change sequence.
 * Never holds a `null` value.
 */
export type Snapshot = Record<string, Value>;

/** Microseconds since the recording session's start instant. */
export type Elapsed = bigint;

export type Timestamped<T> = [elapsed: Elapsed, value: T];

/**
 * Set `key` as an own enumerable property. Plain assignment would treat
 * `"__proto__"` as the prototype setter and drop the key.
 */
export function setEntry(target: Record<string, Value>, key: string, value: Value): void {
  Object.defineProperty(target, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}
