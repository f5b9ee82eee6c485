// Public surface

export type { Change, Elapsed, Snapshot, Timestamped, Value, ValueMapping } from "./types";

// Binary format
export {
  MAGIC_NUMBER,
  RECORDING_FORMAT_VERSION,
  SUPPORTED_FORMAT_VERSIONS,
  HEADER_SIZE,
  FRAME_PREFIX_SIZE,
  currentHeader,
} from "./recording/recordingFormat";
export type { RecordingFrame, RecordingHeader } from "./recording/recordingFormat";
export { encodeHeader, decodeHeader, readHeader } from "./recording/headerCodec";
export { encodeFrame, decodeFrame } from "./recording/frameCodec";

// Errors
export {
  RecordingError,
  InvalidMagicNumberError,
  UnsupportedFormatVersionError,
  TruncatedFrameError,
  DecodeFailureError,
  IOFailureError,
  OutOfOrderFrameError,
} from "./recording/errors";
export type { RecordingErrorCode } from "./recording/errors";

// Byte streams
export { BufferByteSource, FileByteSource, openFileSource } from "./recording/byteSource";
export type { ByteSource } from "./recording/byteSource";
export {
  MemoryByteSink,
  FileByteSink,
  AsyncFileSink,
  MemoryAsyncSink,
} from "./recording/byteSink";
export type { ByteSink, AsyncByteSink, FileSinkOptions } from "./recording/byteSink";

// Payloads
export {
  jsonChangeCodec,
  rawPayloadCodec,
  serializeChange,
  deserializeChange,
  makeChange,
} from "./recording/changeCodec";
export type { PayloadCodec } from "./recording/changeCodec";

// Reading, aggregation, rewriting
export {
  openRecording,
  iterFrames,
  iterChanges,
  iterUpdates,
  iterRecordingFile,
  iterStateFile,
} from "./recording/recordingReader";
export type { IterFramesOptions } from "./recording/recordingReader";
export { applyChange, iterFullStates } from "./recording/aggregate";
export { writeHeader, writeEntry } from "./recording/recordingWriter";
export {
  renameKeys,
  renameChangeKeys,
  rewriteRecording,
  rewriteRecordingFile,
  replaceNarupa,
} from "./recording/rewrite";

// Live capture
export { monotonicNowUs } from "./live/clock";
export type { Clock } from "./live/clock";
export {
  recordStream,
  recordSession,
  recordToFiles,
  recordingPaths,
} from "./live/liveRecorder";
export type {
  CaptureSource,
  RemoteSession,
  ChannelName,
  SessionSinks,
  SessionResult,
  RecordStreamOptions,
  RecordSessionOptions,
} from "./live/liveRecorder";
export { connectWsSession, SocketMessages } from "./live/wsSession";
export type { WsSession, WsSessionOptions } from "./live/wsSession";
