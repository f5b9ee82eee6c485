import type { ByteSource } from "./byteSource";
import {
  InvalidMagicNumberError,
  IOFailureError,
  UnsupportedFormatVersionError,
} from "./errors";
import {
  HEADER_SIZE,
  MAGIC_NUMBER,
  MAGIC_SIZE,
  SUPPORTED_FORMAT_VERSIONS,
  type RecordingHeader,
} from "./recordingFormat";

// Wire format: [magic: u64 LE] [version: u64 LE]

export function encodeHeader(header: RecordingHeader): Uint8Array {
  const buf = new Uint8Array(HEADER_SIZE);
  const view = new DataView(buf.buffer);
  view.setBigUint64(0, header.magicNumber, true);
  view.setBigUint64(8, header.formatVersion, true);
  return buf;
}

/**
 * Decode and validate the 16-byte recording header.
 * The magic number is checked before the version, and before the length:
 * input too short to hold a magic number is not a recording.
 */
export function decodeHeader(bytes: Uint8Array): RecordingHeader {
  if (bytes.length < MAGIC_SIZE) {
    throw new InvalidMagicNumberError(null);
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, Math.min(bytes.length, HEADER_SIZE));
  const magicNumber = view.getBigUint64(0, true);
  if (magicNumber !== MAGIC_NUMBER) {
    throw new InvalidMagicNumberError(magicNumber);
  }

  if (bytes.length < HEADER_SIZE) {
    throw new IOFailureError(
      `Truncated header: expected ${HEADER_SIZE} bytes, got ${bytes.length}`
    );
  }

  const formatVersion = view.getBigUint64(8, true);
  if (!SUPPORTED_FORMAT_VERSIONS.includes(formatVersion)) {
    throw new UnsupportedFormatVersionError(formatVersion, SUPPORTED_FORMAT_VERSIONS);
  }

  return { magicNumber, formatVersion };
}

export function readHeader(source: ByteSource): RecordingHeader {
  return decodeHeader(source.read(HEADER_SIZE));
}
