import type { Elapsed } from "../types";
import type { ByteSink } from "./byteSink";
import { encodeFrame } from "./frameCodec";
import { encodeHeader } from "./headerCodec";
import { currentHeader, type RecordingHeader } from "./recordingFormat";

export function writeHeader(sink: ByteSink, header: RecordingHeader = currentHeader()): void {
  sink.write(encodeHeader(header));
}

/**
 * Append one frame. The frame is encoded whole before it reaches the sink.
 */
export function writeEntry(sink: ByteSink, elapsed: Elapsed, payload: Uint8Array): void {
  sink.write(encodeFrame(elapsed, payload));
}
