import { describe, it, expect } from "vitest";
import type { Change, Elapsed, Snapshot } from "../src/types";
import { applyChange, iterFullStates } from "../src/recording/aggregate";
import { deserializeChange } from "../src/recording/changeCodec";
import { change } from "./helpers";

function collect(entries: Array<[Elapsed, Change]>): Array<[Elapsed, Snapshot]> {
  return [...iterFullStates(entries)];
}

describe("Aggregation", () => {
  it("drops a key after a null update", () => {
    const states = collect([
      [1n, change({ a: 1 })],
      [2n, change({ b: 2 })],
      [3n, change({ a: null })],
    ]);

    expect(states).toEqual([
      [1n, { a: 1 }],
      [2n, { a: 1, b: 2 }],
      [3n, { b: 2 }],
    ]);
  });

  it("overwrites nested values as a whole", () => {
    const states = collect([
      [1n, change({ avatar: { pos: [0, 0, 0], name: "left" } })],
      [2n, change({ avatar: { pos: [1, 1, 1] } })],
    ]);
    expect(states[1][1]).toEqual({ avatar: { pos: [1, 1, 1] } });
  });

  it("never stores a null sentinel", () => {
    const states = collect([[1n, change({ ghost: null, kept: false })]]);
    expect(states[0][1]).toEqual({ kept: false });
    expect("ghost" in states[0][1]).toBe(false);
  });

  it("does not consult the removals set", () => {
    const states = collect([
      [1n, change({ a: 1 })],
      [2n, change({}, ["a"])],
    ]);
    expect(states[1][1]).toEqual({ a: 1 });
  });

  it("yields independent snapshots", () => {
    const states = collect([
      [1n, change({ a: 1 })],
      [2n, change({ b: 2 })],
    ]);
    states[0][1]["z"] = 26;
    expect(states[1][1]).toEqual({ a: 1, b: 2 });
  });

  it("is deterministic and does not mutate its inputs", () => {
    const entries: Array<[Elapsed, Change]> = [
      [1n, change({ a: 1, b: "x" })],
      [5n, change({ b: null, c: [1, 2] })],
    ];
    const first = collect(entries);
    const second = collect(entries);
    expect(second).toEqual(first);
    expect(entries[1][1].updates).toEqual({ b: null, c: [1, 2] });
  });

  it("applyChange leaves the prior snapshot untouched", () => {
    const prior: Snapshot = { a: 1, b: 2 };
    const next = applyChange(prior, change({ a: null, c: 3 }));
    expect(next).toEqual({ b: 2, c: 3 });
    expect(prior).toEqual({ a: 1, b: 2 });
  });

  it("treats __proto__ as an ordinary state key", () => {
    const next = applyChange({}, deserializeChange('{"updates":{"__proto__":7}}'));
    expect(Object.keys(next)).toEqual(["__proto__"]);
    expect(next["__proto__"]).toBe(7);
    expect(Object.getPrototypeOf(next)).toBe(Object.prototype);
  });

  it("carries a __proto__ key through folded snapshots until a null update", () => {
    const states = collect([
      [1n, deserializeChange('{"updates":{"__proto__":{"a":1}}}')],
      [2n, change({ b: 2 })],
      [3n, deserializeChange('{"updates":{"__proto__":null}}')],
    ]);
    expect(states.map(([, state]) => Object.keys(state))).toEqual([
      ["__proto__"],
      ["__proto__", "b"],
      ["b"],
    ]);
  });
});
