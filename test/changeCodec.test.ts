import { describe, it, expect } from "vitest";
import { DecodeFailureError } from "../src/recording/errors";
import { deserializeChange, jsonChangeCodec, serializeChange } from "../src/recording/changeCodec";
import { change } from "./helpers";

const encoder = new TextEncoder();

describe("JSON change codec", () => {
  it("serializes updates and removals", () => {
    expect(serializeChange(change({ "scene.box": [1, 2] }, ["old"]))).toBe(
      '{"updates":{"scene.box":[1,2]},"removals":["old"]}'
    );
  });

  it("decodes what it encodes", () => {
    const original = change({ a: { b: [true, null, "s"] }, n: 1.5 }, ["gone"]);
    const decoded = jsonChangeCodec.decode(jsonChangeCodec.encode(original));
    expect(decoded.updates).toEqual(original.updates);
    expect([...decoded.removals]).toEqual(["gone"]);
  });

  it("treats missing fields as empty", () => {
    const decoded = deserializeChange("{}");
    expect(decoded.updates).toEqual({});
    expect(decoded.removals.size).toBe(0);
  });

  it("fails on malformed JSON", () => {
    expect(() => jsonChangeCodec.decode(encoder.encode("{not json"))).toThrow(DecodeFailureError);
  });

  it("fails on invalid UTF-8", () => {
    expect(() => jsonChangeCodec.decode(new Uint8Array([0xff, 0xfe]))).toThrow(DecodeFailureError);
  });

  it("rejects removals that are not strings", () => {
    expect(() => jsonChangeCodec.decode(encoder.encode('{"removals":[1]}'))).toThrow(
      "Change removals must be an array of strings."
    );
  });

  it("keeps a __proto__ key as an ordinary update key", () => {
    const decoded = jsonChangeCodec.decode(
      encoder.encode('{"updates":{"__proto__":{"a":1},"b":2},"removals":[]}')
    );
    expect(Object.keys(decoded.updates)).toEqual(["__proto__", "b"]);
    expect(Object.getPrototypeOf(decoded.updates)).toBe(Object.prototype);
  });

  it("keeps a nested __proto__ key through decode and encode", () => {
    const json = '{"updates":{"x":{"__proto__":1,"y":[{"__proto__":null}]}},"removals":[]}';
    expect(serializeChange(deserializeChange(json))).toBe(json);
  });

  it("rejects a change that is not an object", () => {
    expect(() => jsonChangeCodec.decode(encoder.encode("[1,2]"))).toThrow(
      "Invalid change payload: Change is not an object."
    );
  });
});
