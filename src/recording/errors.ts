export type RecordingErrorCode =
  | "INVALID_MAGIC_NUMBER"
  | "UNSUPPORTED_FORMAT_VERSION"
  | "TRUNCATED_FRAME"
  | "DECODE_FAILURE"
  | "IO_FAILURE"
  | "OUT_OF_ORDER_FRAME";

export class RecordingError extends Error {
  readonly code: RecordingErrorCode;

  constructor(code: RecordingErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidMagicNumberError extends RecordingError {
  /** `null` when the input ends before a full magic number. */
  constructor(readonly got: bigint | null) {
    super(
      "INVALID_MAGIC_NUMBER",
      got === null ? "Invalid magic number: input too short" : `Invalid magic number: ${got.toString()}`
    );
  }
}

export class UnsupportedFormatVersionError extends RecordingError {
  constructor(
    readonly got: bigint,
    readonly supported: readonly bigint[]
  ) {
    super(
      "UNSUPPORTED_FORMAT_VERSION",
      `Unsupported format version ${got.toString()}; supported: ${supported.join(", ")}`
    );
  }
}

export class TruncatedFrameError extends RecordingError {
  constructor(
    readonly expected: number,
    readonly received: number
  ) {
    super("TRUNCATED_FRAME", `Truncated frame: expected ${expected} bytes, got ${received}`);
  }
}

export class DecodeFailureError extends RecordingError {
  constructor(message: string, readonly elapsed?: bigint, options?: { cause?: unknown }) {
    super(
      "DECODE_FAILURE",
      elapsed === undefined ? message : `${message} (frame at ${elapsed.toString()}us)`,
      options
    );
  }
}

export class IOFailureError extends RecordingError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("IO_FAILURE", message, options);
  }
}

export class OutOfOrderFrameError extends RecordingError {
  constructor(
    readonly previous: bigint,
    readonly got: bigint
  ) {
    super(
      "OUT_OF_ORDER_FRAME",
      `Frame timestamp ${got.toString()} is earlier than previous ${previous.toString()}`
    );
  }
}

export function getErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
