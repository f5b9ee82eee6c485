import fs from "node:fs";
import { IOFailureError, getErrorMessage } from "./errors";

const READ_CHUNK_SIZE = 64 * 1024;

/**
 * A forward-only byte stream.
 */
export interface ByteSource {
  /**
   * Read up to `length` bytes. Fewer bytes come back only at end of stream.
   */
  read(length: number): Uint8Array;
  close(): void;
}

export class BufferByteSource implements ByteSource {
  private offset = 0;

  constructor(private readonly bytes: Uint8Array) {}

  read(length: number): Uint8Array {
    const end = Math.min(this.offset + length, this.bytes.length);
    const out = this.bytes.subarray(this.offset, end);
    this.offset = end;
    return out;
  }

  /** Bytes consumed so far. */
  get position(): number {
    return this.offset;
  }

  close(): void {
    // nothing to release
  }
}

/**
 * Reads a file through a descriptor. The descriptor is released once,
 * on the first `close()`.
 */
export class FileByteSource implements ByteSource {
  private fd: number | null;

  constructor(readonly filePath: string) {
    try {
      this.fd = fs.openSync(filePath, "r");
    } catch (err) {
      throw new IOFailureError(`Cannot open ${filePath}: ${getErrorMessage(err)}`, { cause: err });
    }
  }

  read(length: number): Uint8Array {
    if (this.fd === null) {
      throw new IOFailureError(`Read after close: ${this.filePath}`);
    }

    // Chunked so that a bogus length prefix cannot force a huge allocation.
    const chunks: Buffer[] = [];
    let total = 0;
    while (total < length) {
      const want = Math.min(length - total, READ_CHUNK_SIZE);
      const chunk = Buffer.alloc(want);
      let n: number;
      try {
        n = fs.readSync(this.fd, chunk, 0, want, null);
      } catch (err) {
        throw new IOFailureError(`Read failed on ${this.filePath}: ${getErrorMessage(err)}`, {
          cause: err,
        });
      }
      if (n === 0) break;
      chunks.push(n === want ? chunk : chunk.subarray(0, n));
      total += n;
    }

    return chunks.length === 1 ? chunks[0] : Buffer.concat(chunks, total);
  }

  close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    fs.closeSync(fd);
  }
}

export function openFileSource(filePath: string): FileByteSource {
  return new FileByteSource(filePath);
}
