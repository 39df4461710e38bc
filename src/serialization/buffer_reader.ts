import {
  I32_SIZE,
  MAX_7BIT_INT_BYTES,
  U16_SIZE,
  U32_SIZE,
  U64_SIZE,
  U8_SIZE,
} from "./buffer_constants.ts";
import {
  EndOfStreamError,
  IndexOutOfRangeError,
  IOFailureError,
  ReadFailureError,
} from "./buffer_error.ts";
import type { ISyncSeekableReadable } from "./buffers/buffer_sync.ts";
import {
  isSyncSeekableReadable,
  ReadBufferError,
} from "./buffers/buffer_sync.ts";
import { SyncInMemorySeekableBuffer } from "./buffers/in_memory_buffer_sync.ts";
import { readUIntLE } from "./read_uint_le.ts";
import { err, ok, type Result } from "./result.ts";
import { SeekOrigin } from "./seek_origin.ts";
import { decode } from "./text_encoding.ts";

function verifyCount(value: number, name: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative integer. Got ${value}`);
  }
}

/**
 * Reads primitive values in binary from a seekable medium.
 *
 * Every fixed-size or counted read checks `position + size <= length` before
 * touching the medium. When that fails the read returns an
 * {@link EndOfStreamError} and the cursor does not move.
 *
 * @example
 * ```typescript
 * const reader = new BufferReader(bytes);
 * const id = reader.readU32();
 * if (!id.ok && id.error.kind === "EndOfStream") {
 *   // not enough data yet
 * }
 * ```
 */
export class BufferReader {
  readonly #stream: ISyncSeekableReadable;

  /**
   * Creates a reader over `source`. Raw bytes are copied into an in-memory
   * medium with the cursor at offset 0.
   */
  constructor(source: Uint8Array | ISyncSeekableReadable) {
    if (source instanceof Uint8Array) {
      this.#stream = new SyncInMemorySeekableBuffer(source);
    } else if (isSyncSeekableReadable(source)) {
      this.#stream = source;
    } else {
      throw new TypeError(
        "BufferReader requires a Uint8Array or a readable seekable medium.",
      );
    }
  }

  /**
   * Gets the position within the current stream.
   */
  position(): Result<number> {
    return this.seek(0, SeekOrigin.Current);
  }

  /**
   * Gets the length in bytes of the stream. The cursor is left where it was.
   */
  length(): Result<number> {
    const current = this.position();
    if (!current.ok) {
      return current;
    }
    const end = this.seek(0, SeekOrigin.End);
    if (!end.ok) {
      return end;
    }
    if (current.value !== end.value) {
      const restored = this.seek(current.value, SeekOrigin.Begin);
      if (!restored.ok) {
        return restored;
      }
    }
    return end;
  }

  /**
   * Moves the cursor and returns the new absolute position.
   */
  seek(offset: number, origin: SeekOrigin): Result<number> {
    try {
      return ok(this.#stream.seek(offset, origin));
    } catch (cause) {
      return err(new IndexOutOfRangeError(offset, cause));
    }
  }

  /**
   * Gets the number of bytes between the cursor and the end of the stream.
   */
  remaining(): Result<number> {
    const current = this.position();
    if (!current.ok) {
      return current;
    }
    const length = this.length();
    if (!length.ok) {
      return length;
    }
    return ok(length.value - current.value);
  }

  /**
   * Reads the next byte and advances the cursor by one byte.
   */
  readU8(): Result<number> {
    const bytes = this.readExact(U8_SIZE);
    return bytes.ok ? ok(readUIntLE(bytes.value, 0, U8_SIZE)) : bytes;
  }

  /**
   * Reads a two-byte little-endian unsigned integer and advances the cursor by
   * two bytes.
   */
  readU16(): Result<number> {
    const bytes = this.readExact(U16_SIZE);
    return bytes.ok ? ok(readUIntLE(bytes.value, 0, U16_SIZE)) : bytes;
  }

  /**
   * Reads a four-byte little-endian unsigned integer and advances the cursor
   * by four bytes.
   */
  readU32(): Result<number> {
    const bytes = this.readExact(U32_SIZE);
    return bytes.ok ? ok(readUIntLE(bytes.value, 0, U32_SIZE)) : bytes;
  }

  /**
   * Reads a four-byte little-endian signed integer and advances the cursor by
   * four bytes.
   */
  readI32(): Result<number> {
    const bytes = this.readExact(I32_SIZE);
    return bytes.ok ? ok(readUIntLE(bytes.value, 0, I32_SIZE) | 0) : bytes;
  }

  /**
   * Reads an eight-byte unsigned integer stored as two little-endian 32-bit
   * halves, low half first, and advances the cursor by eight bytes.
   */
  readU64(): Result<bigint> {
    const bytes = this.readExact(U64_SIZE);
    if (!bytes.ok) {
      return bytes;
    }
    const lo = BigInt(readUIntLE(bytes.value, 0, 4));
    const hi = BigInt(readUIntLE(bytes.value, 4, 4));
    return ok((hi << 32n) | lo);
  }

  /**
   * Reads a 32-bit integer written 7 bits at a time and returns it as a
   * signed value. Fails with an {@link IOFailureError} if a sixth byte would
   * be needed.
   */
  read7BitInt(): Result<number> {
    let count = 0;
    let shift = 0;
    for (;;) {
      if (shift === MAX_7BIT_INT_BYTES * 7) {
        return err(
          new IOFailureError(
            `Too many bytes in 7-bit encoded int (more than ${MAX_7BIT_INT_BYTES}).`,
          ),
        );
      }
      const byte = this.readU8();
      if (!byte.ok) {
        return byte;
      }
      count |= (byte.value & 0x7f) << shift;
      shift += 7;
      if ((byte.value & 0x80) === 0) {
        return ok(count);
      }
    }
  }

  /**
   * Same as {@link read7BitInt}, returning the unsigned interpretation.
   */
  read7BitUInt(): Result<number> {
    const value = this.read7BitInt();
    return value.ok ? ok(value.value >>> 0) : value;
  }

  /**
   * Reads a string written as a 7-bit encoded UTF-8 byte length followed by
   * that many UTF-8 bytes.
   */
  readString(): Result<string> {
    const length = this.read7BitInt();
    if (!length.ok) {
      return length;
    }
    if (length.value < 0) {
      return err(
        new IOFailureError(`Negative string length ${length.value}.`),
      );
    }
    if (length.value === 0) {
      return ok("");
    }
    const bytes = this.readBytes(length.value);
    if (!bytes.ok) {
      return bytes;
    }
    try {
      return ok(decode(bytes.value));
    } catch (cause) {
      return err(new IOFailureError("String is not valid UTF-8.", cause));
    }
  }

  /**
   * Reads `count` bytes and advances the cursor by that many bytes.
   */
  readBytes(count: number): Result<Uint8Array> {
    verifyCount(count, "count");
    return this.readExact(count);
  }

  /**
   * Reads `count` bytes starting at `offset` without moving the cursor. The
   * prior position is restored whether or not the read succeeds.
   */
  readBytesAt(offset: number, count: number): Result<Uint8Array> {
    verifyCount(offset, "offset");
    verifyCount(count, "count");
    const length = this.length();
    if (!length.ok) {
      return length;
    }
    if (offset + count > length.value) {
      return err(new EndOfStreamError(offset, count, length.value));
    }
    const current = this.position();
    if (!current.ok) {
      return current;
    }
    const moved = this.seek(offset, SeekOrigin.Begin);
    if (!moved.ok) {
      return moved;
    }
    const bytes = this.readBytes(count);
    const restored = this.seek(current.value, SeekOrigin.Begin);
    if (!bytes.ok) {
      return bytes;
    }
    return restored.ok ? bytes : restored;
  }

  private readExact(size: number): Result<Uint8Array> {
    const current = this.position();
    if (!current.ok) {
      return current;
    }
    const length = this.length();
    if (!length.ok) {
      return length;
    }
    if (current.value + size > length.value) {
      return err(new EndOfStreamError(current.value, size, length.value));
    }
    let bytes: Uint8Array;
    try {
      bytes = this.#stream.read(size);
    } catch (cause) {
      return err(new ReadFailureError(cause));
    }
    if (bytes.length !== size) {
      return err(
        new ReadFailureError(
          new ReadBufferError(
            `Short read from underlying medium. expected=${size}, actual=${bytes.length}`,
            current.value,
            size,
            length.value,
          ),
        ),
      );
    }
    return ok(bytes);
  }
}
