import { setEntry, type Change, type Snapshot, type Timestamped } from "../types";

/**
 * Apply one change to a snapshot.
 * Pure function: does not mutate inputs.
 *
 * Every update key is overwritten, then keys left holding `null` are
 * dropped. `change.removals` is not consulted; a `null` update is the only
 * deletion signal.
 */
export function applyChange(snapshot: Snapshot, change: Change): Snapshot {
  const merged: Snapshot = { ...snapshot, ...change.updates };
  const next: Snapshot = {};
  for (const [key, value] of Object.entries(merged)) {
    if (value !== null) setEntry(next, key, value);
  }
  return next;
}

/**
 * Fold a sequence of timestamped changes into cumulative snapshots.
 * The accumulator lives only as long as the returned generator.
 */
export function* iterFullStates(
  changes: Iterable<Timestamped<Change>>
): Generator<Timestamped<Snapshot>> {
  let state: Snapshot = {};
  for (const [elapsed, change] of changes) {
    state = applyChange(state, change);
    yield [elapsed, { ...state }];
  }
}
