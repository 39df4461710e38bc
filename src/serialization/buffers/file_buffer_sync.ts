import {
  closeSync,
  fstatSync,
  openSync,
  readSync,
  writeSync,
} from "node:fs";
import type { ISyncSeekableStream } from "./buffer_sync.ts";
import { ReadBufferError, SeekBufferError } from "./buffer_sync.ts";
import { resolveSeekTarget, type SeekOrigin } from "../seek_origin.ts";

/**
 * Open mode for a {@link SyncFileSeekableBuffer}.
 *
 * - `"r"`: read only; the file must exist.
 * - `"r+"`: read and write; the file must exist.
 * - `"w+"`: read and write; the file is created or truncated.
 */
export type FileOpenMode = "r" | "r+" | "w+";

/**
 * Seekable medium backed by a file descriptor (synchronous).
 *
 * The cursor lives in this object and every read or write is positional, so
 * the descriptor's own offset is never used. Length is taken from `fstat` on
 * each request. Errors raised by `node:fs` propagate unchanged.
 *
 * @example
 * ```typescript
 * const file = new SyncFileSeekableBuffer("/tmp/data.bin", "w+");
 * const writer = new BufferWriter(file);
 * writer.writeU32(9001);
 * file.close();
 * ```
 */
export class SyncFileSeekableBuffer implements ISyncSeekableStream {
  #fd: number | undefined;
  #position = 0;

  /**
   * Opens `path` with the given mode. The cursor starts at offset 0.
   */
  public constructor(path: string, mode: FileOpenMode = "r") {
    this.#fd = openSync(path, mode);
  }

  /**
   * Returns the current size of the file in bytes.
   */
  public length(): number {
    return fstatSync(this.descriptor()).size;
  }

  public seek(offset: number, origin: SeekOrigin): number {
    const length = this.length();
    const target = resolveSeekTarget(offset, origin, this.#position, length);
    if (!Number.isInteger(target) || target < 0 || target > length) {
      throw new SeekBufferError(
        `Seek target out of bounds. target=${target}, bufferLength=${length}`,
        target,
        length,
      );
    }
    this.#position = target;
    return target;
  }

  public read(size: number): Uint8Array {
    if (!Number.isInteger(size) || size < 0) {
      throw new ReadBufferError(
        `Size must be a non-negative integer. Got size=${size}`,
        this.#position,
        size,
        this.length(),
      );
    }
    const target = new Uint8Array(size);
    let filled = 0;
    while (filled < size) {
      const count = readSync(
        this.descriptor(),
        target,
        filled,
        size - filled,
        this.#position + filled,
      );
      if (count === 0) {
        break;
      }
      filled += count;
    }
    this.#position += filled;
    return filled === size ? target : target.slice(0, filled);
  }

  public write(data: Uint8Array): number {
    let written = 0;
    while (written < data.length) {
      written += writeSync(
        this.descriptor(),
        data,
        written,
        data.length - written,
        this.#position + written,
      );
    }
    this.#position += written;
    return written;
  }

  /**
   * Closes the file descriptor. Further operations throw.
   */
  public close(): void {
    if (this.#fd === undefined) {
      return;
    }
    const fd = this.#fd;
    this.#fd = undefined;
    closeSync(fd);
  }

  private descriptor(): number {
    if (this.#fd === undefined) {
      throw new Error("File medium has been closed");
    }
    return this.#fd;
  }
}
