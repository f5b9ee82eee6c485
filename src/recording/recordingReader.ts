import type { Change, Elapsed, Timestamped, Value } from "../types";
import { openFileSource, type ByteSource } from "./byteSource";
import { jsonChangeCodec, type PayloadCodec } from "./changeCodec";
import { DecodeFailureError, OutOfOrderFrameError, getErrorMessage } from "./errors";
import { decodeFrame } from "./frameCodec";
import { readHeader } from "./headerCodec";
import type { RecordingFrame, RecordingHeader } from "./recordingFormat";

export type IterFramesOptions = {
  /** Throw `OutOfOrderFrameError` when a timestamp goes backwards. */
  strictOrder?: boolean;
};

/**
 * Validate the header and leave `source` positioned on the first frame.
 */
export function openRecording(source: ByteSource): RecordingHeader {
  return readHeader(source);
}

/**
 * Lazily decode frames until the source is exhausted.
 * Single pass: restart by reopening the source.
 */
export function* iterFrames(
  source: ByteSource,
  opts: IterFramesOptions = {}
): Generator<RecordingFrame> {
  let previous: Elapsed | null = null;
  for (;;) {
    const frame = decodeFrame(source);
    if (frame === null) return;
    if (opts.strictOrder && previous !== null && frame.elapsed < previous) {
      throw new OutOfOrderFrameError(previous, frame.elapsed);
    }
    previous = frame.elapsed;
    yield frame;
  }
}

export function* iterChanges<T = Change>(
  frames: Iterable<RecordingFrame>,
  codec: PayloadCodec<T>
): Generator<Timestamped<T>> {
  for (const { elapsed, payload } of frames) {
    let decoded: T;
    try {
      decoded = codec.decode(payload);
    } catch (err) {
      throw new DecodeFailureError(getErrorMessage(err), elapsed, { cause: err });
    }
    yield [elapsed, decoded];
  }
}

/**
 * Expose only the `updates` half of each change.
 */
export function* iterUpdates(
  changes: Iterable<Timestamped<Change>>
): Generator<Timestamped<Record<string, Value>>> {
  for (const [elapsed, change] of changes) {
    yield [elapsed, change.updates];
  }
}

/**
 * Yield the frames of a recording file. The file is closed once, whether
 * iteration finishes, throws, or is abandoned.
 */
export function* iterRecordingFile(
  filePath: string,
  opts: IterFramesOptions = {}
): Generator<RecordingFrame> {
  const source = openFileSource(filePath);
  try {
    openRecording(source);
    yield* iterFrames(source, opts);
  } finally {
    source.close();
  }
}

export function iterStateFile(
  filePath: string,
  codec: PayloadCodec<Change> = jsonChangeCodec
): Generator<Timestamped<Change>> {
  return iterChanges(iterRecordingFile(filePath), codec);
}
