/**
 * Synchronous interfaces for seekable byte media.
 */
import type { SeekOrigin } from "../seek_origin.ts";

export {
  ReadBufferError,
  SeekBufferError,
} from "./buffer_error.ts";

/**
 * A medium with a cursor that can be queried and moved.
 */
export interface ISyncSeekable {
  /**
   * Moves the cursor and returns the new absolute position. `seek(0,
   * SeekOrigin.Current)` reports the position without moving it.
   * Throws a SeekBufferError when the target is negative or past the end.
   */
  seek(offset: number, origin: SeekOrigin): number;
}

/**
 * A seekable medium that supports sequential reads from the cursor.
 */
export interface ISyncSeekableReadable extends ISyncSeekable {
  /**
   * Reads up to `size` bytes from the cursor and advances past them. Fewer
   * bytes are returned only when the end is reached first.
   * Throws a ReadBufferError if the medium itself fails.
   */
  read(size: number): Uint8Array;
}

/**
 * A seekable medium that supports sequential writes at the cursor.
 */
export interface ISyncSeekableWritable extends ISyncSeekable {
  /**
   * Writes `data` at the cursor, overwriting existing bytes and extending the
   * medium past its end as needed. Returns the number of bytes written.
   * Throws if the medium rejects the write.
   */
  write(data: Uint8Array): number;
}

/**
 * Convenience type for media capable of both read and write operations.
 */
export type ISyncSeekableStream = ISyncSeekableReadable & ISyncSeekableWritable;

/**
 * Type guard to check if an object implements ISyncSeekableReadable.
 */
export function isSyncSeekableReadable(
  obj: unknown,
): obj is ISyncSeekableReadable {
  return (
    typeof obj === "object" &&
    obj !== null &&
    "seek" in obj &&
    typeof obj.seek === "function" &&
    "read" in obj &&
    typeof obj.read === "function"
  );
}

/**
 * Type guard to check if an object implements ISyncSeekableStream.
 */
export function isSyncSeekableStream(
  obj: unknown,
): obj is ISyncSeekableStream {
  return (
    isSyncSeekableReadable(obj) &&
    "write" in obj &&
    typeof obj.write === "function"
  );
}
