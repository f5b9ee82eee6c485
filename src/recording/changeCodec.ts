import { setEntry, type Change, type Value, type ValueMapping } from "../types";
import { DecodeFailureError, getErrorMessage } from "./errors";

/**
 * Converts between a message and the payload bytes stored in a frame.
 */
export interface PayloadCodec<T> {
  encode(value: T): Uint8Array;
  decode(bytes: Uint8Array): T;
}

/**
 * Stores payloads as given. Used for live messages that already arrive
 * serialized.
 */
export const rawPayloadCodec: PayloadCodec<Uint8Array> = {
  encode: (value) => value,
  decode: (bytes) => bytes,
};

export type SerializedChange = {
  updates: ValueMapping;
  removals: string[];
};

function isObject(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function isStringArray(x: unknown): x is string[] {
  return Array.isArray(x) && x.every((k) => typeof k === "string");
}

/**
 * Narrow parsed JSON to a `Value`, rejecting anything JSON cannot carry.
 */
export function toValue(x: unknown, path = "$"): Value {
  if (x === null || typeof x === "boolean" || typeof x === "string") return x;
  if (typeof x === "number") {
    if (!Number.isFinite(x)) throw new Error(`Non-finite number at ${path}`);
    return x;
  }
  if (Array.isArray(x)) {
    return x.map((item, i) => toValue(item, `${path}[${i}]`));
  }
  if (isObject(x)) {
    const out: ValueMapping = {};
    for (const [key, item] of Object.entries(x)) {
      setEntry(out, key, toValue(item, `${path}.${key}`));
    }
    return out;
  }
  throw new Error(`Unsupported value of type ${typeof x} at ${path}`);
}

export function serializeChange(change: Change): string {
  const doc: SerializedChange = {
    updates: change.updates,
    removals: [...change.removals],
  };
  return JSON.stringify(doc);
}

/**
 * Parse a serialized change and validate its shape.
 */
export function deserializeChange(json: string): Change {
  const parsed: unknown = JSON.parse(json);

  if (!isObject(parsed)) {
    throw new Error("Change is not an object.");
  }

  const updates = parsed["updates"] ?? {};
  if (!isObject(updates)) {
    throw new Error("Change updates must be an object.");
  }

  const removals = parsed["removals"] ?? [];
  if (!isStringArray(removals)) {
    throw new Error("Change removals must be an array of strings.");
  }

  const out: Record<string, Value> = {};
  for (const [key, value] of Object.entries(updates)) {
    setEntry(out, key, toValue(value, `updates.${key}`));
  }

  return { updates: out, removals: new Set(removals) };
}

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { fatal: true });

/**
 * UTF-8 JSON encoding of a `Change`: `{"updates": {...}, "removals": [...]}`.
 */
export const jsonChangeCodec: PayloadCodec<Change> = {
  encode(change) {
    return encoder.encode(serializeChange(change));
  },

  decode(bytes) {
    try {
      return deserializeChange(decoder.decode(bytes));
    } catch (err) {
      throw new DecodeFailureError(`Invalid change payload: ${getErrorMessage(err)}`, undefined, {
        cause: err,
      });
    }
  },
};

export function makeChange(
  updates: Record<string, Value> = {},
  removals: Iterable<string> = []
): Change {
  return { updates, removals: new Set(removals) };
}
