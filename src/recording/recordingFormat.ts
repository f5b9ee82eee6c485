import type { Elapsed } from "../types";

export const MAGIC_NUMBER = 6661355757386708963n;

export const RECORDING_FORMAT_VERSION = 2 as const;

export const SUPPORTED_FORMAT_VERSIONS: readonly bigint[] = [2n];

// magic (u64) + version (u64)
export const MAGIC_SIZE = 8;
export const HEADER_SIZE = 16;

// elapsed (u128) + payload length (u64)
export const ELAPSED_SIZE = 16;
export const LENGTH_SIZE = 8;
export const FRAME_PREFIX_SIZE = ELAPSED_SIZE + LENGTH_SIZE;

export const MAX_U128 = (1n << 128n) - 1n;

export type RecordingHeader = {
  magicNumber: bigint;
  formatVersion: bigint;
};

/**
 * One length-prefixed timestamped record of a recording.
 */
export type RecordingFrame = {
  /** Microseconds since the session start instant */
  elapsed: Elapsed;

  /** Opaque payload, exactly as long as the length prefix says */
  payload: Uint8Array;
};

export function currentHeader(): RecordingHeader {
  return {
    magicNumber: MAGIC_NUMBER,
    formatVersion: BigInt(RECORDING_FORMAT_VERSION),
  };
}
