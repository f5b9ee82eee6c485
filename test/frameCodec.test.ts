import { describe, it, expect } from "vitest";
import { BufferByteSource } from "../src/recording/byteSource";
import { TruncatedFrameError } from "../src/recording/errors";
import { decodeFrame, encodeFrame } from "../src/recording/frameCodec";
import { encodeHeader } from "../src/recording/headerCodec";
import { currentHeader } from "../src/recording/recordingFormat";
import { iterFrames, openRecording } from "../src/recording/recordingReader";

const payload = new TextEncoder().encode("hello frame");

describe("Frame codec", () => {
  it("encodes a 24-byte prefix followed by the payload", () => {
    const bytes = encodeFrame(1234n, payload);
    expect(bytes.length).toBe(24 + payload.length);

    const buf = Buffer.from(bytes);
    expect(buf.readBigUInt64LE(0)).toBe(1234n);
    expect(buf.readBigUInt64LE(8)).toBe(0n);
    expect(buf.readBigUInt64LE(16)).toBe(BigInt(payload.length));
    expect(buf.subarray(24).toString("utf8")).toBe("hello frame");
  });

  it("decodes what it encodes and consumes exactly the frame", () => {
    const bytes = Buffer.concat([encodeFrame(77n, payload), Buffer.from([9, 9, 9])]);
    const source = new BufferByteSource(bytes);

    const frame = decodeFrame(source);
    expect(frame?.elapsed).toBe(77n);
    expect(Array.from(frame?.payload ?? [])).toEqual(Array.from(payload));
    expect(source.position).toBe(24 + payload.length);
  });

  it("keeps the high 64 bits of the elapsed time", () => {
    const elapsed = (1n << 64n) + 5n;
    const bytes = encodeFrame(elapsed, new Uint8Array(0));
    expect(bytes[8]).toBe(1);

    const frame = decodeFrame(new BufferByteSource(bytes));
    expect(frame?.elapsed).toBe(elapsed);
    expect(frame?.payload.length).toBe(0);
  });

  it("rejects a negative elapsed time", () => {
    expect(() => encodeFrame(-1n, payload)).toThrow(RangeError);
  });

  it("returns null at a clean end of stream", () => {
    expect(decodeFrame(new BufferByteSource(new Uint8Array(0)))).toBeNull();
  });

  it("fails on a payload short by one byte", () => {
    const bytes = encodeFrame(10n, payload);
    const source = new BufferByteSource(bytes.subarray(0, bytes.length - 1));

    let frame: unknown = "untouched";
    expect(() => {
      frame = decodeFrame(source);
    }).toThrow(TruncatedFrameError);
    expect(frame).toBe("untouched");
  });

  it("fails inside the elapsed field", () => {
    const source = new BufferByteSource(new Uint8Array(5));
    expect(() => decodeFrame(source)).toThrow(TruncatedFrameError);
  });

  it("fails inside the length field", () => {
    const bytes = encodeFrame(10n, payload);
    const source = new BufferByteSource(bytes.subarray(0, 20));
    expect(() => decodeFrame(source)).toThrow(TruncatedFrameError);
  });

  it("fails when the length prefix points past the end of the data", () => {
    const bytes = Buffer.from(encodeFrame(10n, payload));
    bytes.writeBigUInt64LE(1n << 62n, 16);
    expect(() => decodeFrame(new BufferByteSource(bytes))).toThrow(TruncatedFrameError);
  });
});

describe("Frame iteration", () => {
  it("yields complete frames before a truncated one, then fails", () => {
    const second = encodeFrame(20n, payload);
    const bytes = Buffer.concat([
      encodeHeader(currentHeader()),
      encodeFrame(10n, payload),
      second.subarray(0, second.length - 1),
    ]);
    const source = new BufferByteSource(bytes);
    openRecording(source);

    const seen: bigint[] = [];
    expect(() => {
      for (const frame of iterFrames(source)) seen.push(frame.elapsed);
    }).toThrow(TruncatedFrameError);
    expect(seen).toEqual([10n]);
  });
});
