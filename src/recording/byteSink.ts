import fs from "node:fs";
import { open, type FileHandle } from "node:fs/promises";
import { IOFailureError, getErrorMessage } from "./errors";

/**
 * Synchronous append-only byte sink, used by the rewrite tool.
 */
export interface ByteSink {
  write(bytes: Uint8Array): void;
  close(): void;
}

/**
 * Asynchronous append-only byte sink, used by live capture loops.
 * `write` resolves only once every byte has been handed to the sink.
 */
export interface AsyncByteSink {
  write(bytes: Uint8Array): Promise<void>;
  flush(): Promise<void>;
  close(): Promise<void>;
}

export class MemoryByteSink implements ByteSink {
  private readonly chunks: Uint8Array[] = [];
  closed = false;

  write(bytes: Uint8Array): void {
    if (this.closed) throw new IOFailureError("Write after close");
    this.chunks.push(Uint8Array.from(bytes));
  }

  bytes(): Buffer {
    return Buffer.concat(this.chunks);
  }

  close(): void {
    this.closed = true;
  }
}

export class FileByteSink implements ByteSink {
  private fd: number | null;

  constructor(readonly filePath: string) {
    try {
      this.fd = fs.openSync(filePath, "w");
    } catch (err) {
      throw new IOFailureError(`Cannot create ${filePath}: ${getErrorMessage(err)}`, { cause: err });
    }
  }

  write(bytes: Uint8Array): void {
    if (this.fd === null) throw new IOFailureError(`Write after close: ${this.filePath}`);
    let offset = 0;
    try {
      while (offset < bytes.length) {
        offset += fs.writeSync(this.fd, bytes, offset, bytes.length - offset);
      }
    } catch (err) {
      throw new IOFailureError(`Write failed on ${this.filePath}: ${getErrorMessage(err)}`, {
        cause: err,
      });
    }
  }

  close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    fs.closeSync(fd);
  }
}

export type FileSinkOptions = {
  /** fsync after every flush instead of only handing bytes to the OS. */
  durable?: boolean;
};

/**
 * Writes straight to a file handle; there is no user-space buffer, so a
 * flush is a no-op unless `durable` is set.
 */
export class AsyncFileSink implements AsyncByteSink {
  private closed = false;

  private constructor(
    readonly filePath: string,
    private readonly handle: FileHandle,
    private readonly durable: boolean
  ) {}

  static async create(filePath: string, opts: FileSinkOptions = {}): Promise<AsyncFileSink> {
    try {
      const handle = await open(filePath, "w");
      return new AsyncFileSink(filePath, handle, opts.durable ?? false);
    } catch (err) {
      throw new IOFailureError(`Cannot create ${filePath}: ${getErrorMessage(err)}`, { cause: err });
    }
  }

  async write(bytes: Uint8Array): Promise<void> {
    if (this.closed) throw new IOFailureError(`Write after close: ${this.filePath}`);
    let offset = 0;
    try {
      while (offset < bytes.length) {
        const { bytesWritten } = await this.handle.write(bytes, offset, bytes.length - offset);
        offset += bytesWritten;
      }
    } catch (err) {
      throw new IOFailureError(`Write failed on ${this.filePath}: ${getErrorMessage(err)}`, {
        cause: err,
      });
    }
  }

  async flush(): Promise<void> {
    if (!this.durable || this.closed) return;
    try {
      await this.handle.datasync();
    } catch (err) {
      throw new IOFailureError(`Flush failed on ${this.filePath}: ${getErrorMessage(err)}`, {
        cause: err,
      });
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.handle.close();
  }
}

/**
 * In-memory async sink. Each `write` is stored as one chunk, which lets
 * tests check that frames were appended whole.
 */
export class MemoryAsyncSink implements AsyncByteSink {
  readonly chunks: Buffer[] = [];
  flushes = 0;
  closed = false;

  async write(bytes: Uint8Array): Promise<void> {
    if (this.closed) throw new IOFailureError("Write after close");
    this.chunks.push(Buffer.from(bytes));
  }

  async flush(): Promise<void> {
    this.flushes++;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  bytes(): Buffer {
    return Buffer.concat(this.chunks);
  }
}
