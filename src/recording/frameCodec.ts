import type { Elapsed } from "../types";
import type { ByteSource } from "./byteSource";
import { TruncatedFrameError } from "./errors";
import {
  ELAPSED_SIZE,
  FRAME_PREFIX_SIZE,
  LENGTH_SIZE,
  MAX_U128,
  type RecordingFrame,
} from "./recordingFormat";

// Wire format: [elapsed: u128 LE] [length: u64 LE] [payload]

const U64_MASK = (1n << 64n) - 1n;

export function encodeFrame(elapsed: Elapsed, payload: Uint8Array): Uint8Array {
  if (elapsed < 0n || elapsed > MAX_U128) {
    throw new RangeError(`Elapsed time out of u128 range: ${elapsed.toString()}`);
  }

  const buf = new Uint8Array(FRAME_PREFIX_SIZE + payload.length);
  const view = new DataView(buf.buffer);
  view.setBigUint64(0, elapsed & U64_MASK, true);
  view.setBigUint64(8, elapsed >> 64n, true);
  view.setBigUint64(ELAPSED_SIZE, BigInt(payload.length), true);
  buf.set(payload, FRAME_PREFIX_SIZE);
  return buf;
}

/**
 * Decode the next frame from `source`.
 *
 * Returns `null` when the source is exhausted exactly at a frame boundary.
 * Any shortfall after the first byte throws `TruncatedFrameError`, and
 * nothing of the partial frame is returned.
 */
export function decodeFrame(source: ByteSource): RecordingFrame | null {
  const elapsedBytes = source.read(ELAPSED_SIZE);
  if (elapsedBytes.length === 0) return null;
  if (elapsedBytes.length < ELAPSED_SIZE) {
    throw new TruncatedFrameError(ELAPSED_SIZE, elapsedBytes.length);
  }

  const lengthBytes = source.read(LENGTH_SIZE);
  if (lengthBytes.length < LENGTH_SIZE) {
    throw new TruncatedFrameError(
      FRAME_PREFIX_SIZE,
      ELAPSED_SIZE + lengthBytes.length
    );
  }

  const elapsedView = new DataView(elapsedBytes.buffer, elapsedBytes.byteOffset, ELAPSED_SIZE);
  const elapsed =
    elapsedView.getBigUint64(0, true) | (elapsedView.getBigUint64(8, true) << 64n);

  const lengthView = new DataView(lengthBytes.buffer, lengthBytes.byteOffset, LENGTH_SIZE);
  const declared = lengthView.getBigUint64(0, true);
  // Past MAX_SAFE_INTEGER no real file can hold the payload; reading to the
  // end of the source reports the truncation.
  const length =
    declared > BigInt(Number.MAX_SAFE_INTEGER) ? Number.MAX_SAFE_INTEGER : Number(declared);

  const payload = source.read(length);
  if (payload.length < length) {
    throw new TruncatedFrameError(
      FRAME_PREFIX_SIZE + length,
      FRAME_PREFIX_SIZE + payload.length
    );
  }

  return { elapsed, payload };
}
