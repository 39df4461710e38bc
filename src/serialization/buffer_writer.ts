import {
  I32_MAX,
  I32_MIN,
  I32_SIZE,
  U16_MAX,
  U16_SIZE,
  U32_MAX,
  U32_SIZE,
  U64_MAX,
  U8_MAX,
  U8_SIZE,
} from "./buffer_constants.ts";
import {
  type BufferError,
  IndexOutOfRangeError,
  IOFailureError,
  ReadFailureError,
} from "./buffer_error.ts";
import type { ISyncSeekableStream } from "./buffers/buffer_sync.ts";
import { isSyncSeekableStream } from "./buffers/buffer_sync.ts";
import { SyncInMemorySeekableBuffer } from "./buffers/in_memory_buffer_sync.ts";
import { writeUIntLE } from "./read_uint_le.ts";
import { err, ok, type Result } from "./result.ts";
import { SeekOrigin } from "./seek_origin.ts";
import { encode } from "./text_encoding.ts";

const MATERIALIZE_CHUNK_SIZE = 64 * 1024;

function verifyInteger(
  value: number,
  min: number,
  max: number,
  type: string,
): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new RangeError(
      `Value ${value} out of range for ${type} (${min}..${max})`,
    );
  }
}

/**
 * Writes primitive values in binary to a seekable medium.
 *
 * Fixed-width integers are little-endian. Each write advances the medium's
 * cursor by the number of bytes written. Seeking back and writing again
 * overwrites earlier bytes, which lets callers patch fields such as lengths
 * once the data after them is known.
 *
 * Operations never throw for medium failures; they return a failed
 * {@link Result} carrying a {@link BufferError}. Values outside the range of
 * the type being written throw a RangeError.
 *
 * @example
 * ```typescript
 * const writer = new BufferWriter();
 * writer.writeU32(9001);
 * writer.writeString("Hello World!");
 * const bytes = unwrap(writer.toUint8Array());
 * ```
 */
export class BufferWriter {
  readonly #stream: ISyncSeekableStream;

  /**
   * Creates a writer over `stream`, or over a fresh in-memory medium.
   */
  constructor(stream: ISyncSeekableStream = new SyncInMemorySeekableBuffer()) {
    if (!isSyncSeekableStream(stream)) {
      throw new TypeError(
        "BufferWriter requires a readable and writable seekable medium.",
      );
    }
    this.#stream = stream;
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
   * Returns every byte in the stream from offset 0 to the end, whatever the
   * cursor position. The cursor is left at the end.
   */
  toUint8Array(): Result<Uint8Array> {
    const start = this.seek(0, SeekOrigin.Begin);
    if (!start.ok) {
      return start;
    }
    const chunks: Uint8Array[] = [];
    let total = 0;
    try {
      for (;;) {
        const chunk = this.#stream.read(MATERIALIZE_CHUNK_SIZE);
        if (chunk.length === 0) {
          break;
        }
        chunks.push(chunk);
        total += chunk.length;
      }
    } catch (cause) {
      return err(new ReadFailureError(cause));
    }
    if (chunks.length === 1 && chunks[0] !== undefined) {
      return ok(chunks[0]);
    }
    const out = new Uint8Array(total);
    let offset = 0;
    for (const chunk of chunks) {
      out.set(chunk, offset);
      offset += chunk.length;
    }
    return ok(out);
  }

  /**
   * Writes an unsigned byte and advances the stream position by one byte.
   */
  writeU8(value: number): Result<number> {
    verifyInteger(value, 0, U8_MAX, "u8");
    return this.writeRaw(writeUIntLE(value, U8_SIZE));
  }

  /**
   * Writes a two-byte unsigned integer and advances the stream position by
   * two bytes.
   */
  writeU16(value: number): Result<number> {
    verifyInteger(value, 0, U16_MAX, "u16");
    return this.writeRaw(writeUIntLE(value, U16_SIZE));
  }

  /**
   * Writes a four-byte unsigned integer and advances the stream position by
   * four bytes.
   */
  writeU32(value: number): Result<number> {
    verifyInteger(value, 0, U32_MAX, "u32");
    return this.writeRaw(writeUIntLE(value, U32_SIZE));
  }

  /**
   * Writes a four-byte signed integer and advances the stream position by
   * four bytes.
   */
  writeI32(value: number): Result<number> {
    verifyInteger(value, I32_MIN, I32_MAX, "i32");
    return this.writeRaw(writeUIntLE(value, I32_SIZE));
  }

  /**
   * Writes an eight-byte unsigned integer as two little-endian 32-bit halves,
   * low half first, and advances the stream position by eight bytes.
   */
  writeU64(value: bigint): Result<number> {
    if (value < 0n || value > U64_MAX) {
      throw new RangeError(`Value ${value} out of range for u64 (0..${U64_MAX})`);
    }
    const bytes = new Uint8Array(8);
    bytes.set(writeUIntLE(Number(value & 0xffffffffn), 4), 0);
    bytes.set(writeUIntLE(Number(value >> 32n), 4), 4);
    return this.writeRaw(bytes);
  }

  /**
   * Writes a 32-bit integer 7 bits at a time, low group first. The high bit of
   * each byte tells the reader whether another byte follows. Negative values
   * are written as their unsigned bit pattern and always take five bytes.
   *
   * Returns the number of bytes written.
   */
  write7BitInt(value: number): Result<number> {
    verifyInteger(value, I32_MIN, U32_MAX, "7-bit encoded int");
    let n = value >>> 0;
    const groups: number[] = [];
    while (n >= 0x80) {
      groups.push((n & 0x7f) | 0x80);
      n >>>= 7;
    }
    groups.push(n);
    return this.writeRaw(Uint8Array.from(groups));
  }

  /**
   * Writes a string as its UTF-8 byte length (7-bit encoded) followed by the
   * UTF-8 bytes. Returns the total number of bytes written.
   */
  writeString(value: string): Result<number> {
    const bytes = encode(value);
    const prefix = this.write7BitInt(bytes.length);
    if (!prefix.ok || bytes.length === 0) {
      return prefix;
    }
    const payload = this.writeBytes(bytes);
    if (!payload.ok) {
      return payload;
    }
    return ok(prefix.value + payload.value);
  }

  /**
   * Writes bytes verbatim, with no length prefix.
   */
  writeBytes(value: Uint8Array): Result<number> {
    return this.writeRaw(value);
  }

  private writeRaw(bytes: Uint8Array): Result<number, BufferError> {
    let written: number;
    try {
      written = this.#stream.write(bytes);
    } catch (cause) {
      return err(
        new IOFailureError("Write to underlying medium failed.", cause),
      );
    }
    if (written !== bytes.length) {
      return err(
        new IOFailureError(
          `Short write to underlying medium. expected=${bytes.length}, written=${written}`,
        ),
      );
    }
    return ok(written);
  }
}
