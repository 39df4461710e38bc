// Codec
export { BufferReader } from "./serialization/buffer_reader.ts";
export { BufferWriter } from "./serialization/buffer_writer.ts";
export {
  Endianness,
  SeekOrigin,
} from "./serialization/seek_origin.ts";
export {
  encoded7BitIntLength,
  MAX_7BIT_INT_BYTES,
} from "./serialization/buffer_constants.ts";

// Results and errors
export type { Result } from "./serialization/result.ts";
export { err, ok, unwrap } from "./serialization/result.ts";
export type {
  BufferError,
  BufferErrorKind,
} from "./serialization/buffer_error.ts";
export {
  EndOfStreamError,
  IndexOutOfRangeError,
  IOFailureError,
  ReadFailureError,
} from "./serialization/buffer_error.ts";

// Seekable media
export type {
  ISyncSeekable,
  ISyncSeekableReadable,
  ISyncSeekableStream,
  ISyncSeekableWritable,
} from "./serialization/buffers/buffer_sync.ts";
export {
  isSyncSeekableReadable,
  isSyncSeekableStream,
  ReadBufferError,
  SeekBufferError,
} from "./serialization/buffers/buffer_sync.ts";
export { SyncInMemorySeekableBuffer } from "./serialization/buffers/in_memory_buffer_sync.ts";
export type { FileOpenMode } from "./serialization/buffers/file_buffer_sync.ts";
export { SyncFileSeekableBuffer } from "./serialization/buffers/file_buffer_sync.ts";
