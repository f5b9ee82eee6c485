import { setEntry, type Change, type Value, type ValueMapping } from "../types";
import { openFileSource, type ByteSource } from "./byteSource";
import { FileByteSink, type ByteSink } from "./byteSink";
import { jsonChangeCodec, type PayloadCodec } from "./changeCodec";
import { iterChanges, iterFrames } from "./recordingReader";
import { encodeHeader, readHeader } from "./headerCodec";
import { writeEntry } from "./recordingWriter";

/**
 * Replace every occurrence of `from` by `to` in mapping keys, at any depth.
 * Array elements are searched for nested mappings; scalars are untouched.
 */
export function renameKeys(value: Value, from: string, to: string): Value {
  if (value === null || typeof value !== "object") return value;

  if (Array.isArray(value)) {
    return value.map((item) => renameKeys(item, from, to));
  }

  const out: ValueMapping = {};
  for (const [key, item] of Object.entries(value)) {
    setEntry(out, key.replaceAll(from, to), renameKeys(item, from, to));
  }
  return out;
}

/**
 * Rename top-level update keys (recursing into their values) and every
 * removal key.
 */
export function renameChangeKeys(change: Change, from: string, to: string): Change {
  const updates: Record<string, Value> = {};
  for (const [key, value] of Object.entries(change.updates)) {
    setEntry(updates, key.replaceAll(from, to), renameKeys(value, from, to));
  }

  const removals = new Set<string>();
  for (const key of change.removals) {
    removals.add(key.replaceAll(from, to));
  }

  return { updates, removals };
}

/**
 * Copy a recording while renaming keys in every change.
 *
 * Header bytes are copied as read. Each frame keeps its timestamp and gets
 * a length prefix for its re-encoded payload. Frames already written stay
 * in `output` if a later frame fails to decode.
 *
 * @returns the number of frames written
 */
export function rewriteRecording(
  input: ByteSource,
  output: ByteSink,
  from: string,
  to: string,
  codec: PayloadCodec<Change> = jsonChangeCodec
): number {
  const header = readHeader(input);
  output.write(encodeHeader(header));

  let written = 0;
  for (const [elapsed, change] of iterChanges(iterFrames(input), codec)) {
    const renamed = renameChangeKeys(change, from, to);
    writeEntry(output, elapsed, codec.encode(renamed));
    written++;
  }
  return written;
}

export function rewriteRecordingFile(
  inputPath: string,
  outputPath: string,
  from: string,
  to: string,
  codec: PayloadCodec<Change> = jsonChangeCodec
): number {
  const input = openFileSource(inputPath);
  try {
    const output = new FileByteSink(outputPath);
    try {
      return rewriteRecording(input, output, from, to, codec);
    } finally {
      output.close();
    }
  } finally {
    input.close();
  }
}

/**
 * Rename keys written by older servers: `narupa` becomes `nanover`.
 */
export function replaceNarupa(
  input: ByteSource,
  output: ByteSink,
  codec: PayloadCodec<Change> = jsonChangeCodec
): number {
  return rewriteRecording(input, output, "narupa", "nanover", codec);
}
