import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { Change, Elapsed, Value } from "../src/types";
import { MemoryByteSink } from "../src/recording/byteSink";
import { jsonChangeCodec, makeChange } from "../src/recording/changeCodec";
import { writeEntry, writeHeader } from "../src/recording/recordingWriter";
import type { CaptureSource } from "../src/live/liveRecorder";

export const change = (updates: Record<string, Value>, removals: string[] = []): Change =>
  makeChange(updates, removals);

/**
 * Build a complete state recording in memory.
 */
export function buildRecording(entries: Array<[Elapsed, Change]>): Buffer {
  const sink = new MemoryByteSink();
  writeHeader(sink);
  for (const [elapsed, c] of entries) {
    writeEntry(sink, elapsed, jsonChangeCodec.encode(c));
  }
  return sink.bytes();
}

export function makeTempDir(prefix = "recording-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function writeTempRecording(entries: Array<[Elapsed, Change]>, name = "test.state"): string {
  const filePath = path.join(makeTempDir(), name);
  fs.writeFileSync(filePath, buildRecording(entries));
  return filePath;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

const encoder = new TextEncoder();

/**
 * A source that emits `messages`, waiting `delayMs` before each one.
 */
export function textSource(messages: string[], delayMs = 0): CaptureSource<string> {
  return {
    async *subscribe() {
      for (const m of messages) {
        await sleep(delayMs);
        yield m;
      }
    },
    encode: (m) => encoder.encode(m),
  };
}

/**
 * A source that emits `messages` and then never produces again, ignoring
 * the abort signal.
 */
export function stallingSource(messages: string[]): CaptureSource<string> {
  return {
    async *subscribe() {
      for (const m of messages) yield m;
      await new Promise<never>(() => {});
    },
    encode: (m) => encoder.encode(m),
  };
}
