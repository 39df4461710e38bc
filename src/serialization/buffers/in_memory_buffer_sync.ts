import type { ISyncSeekableStream } from "./buffer_sync.ts";
import { ReadBufferError, SeekBufferError } from "./buffer_sync.ts";
import { resolveSeekTarget, type SeekOrigin } from "../seek_origin.ts";

const DEFAULT_CAPACITY = 256;

/**
 * Growable in-memory seekable medium (synchronous).
 *
 * Key features:
 * - Growable: Writes past the end extend the medium, doubling capacity as needed.
 * - Overwrite in place: Writes before the end replace existing bytes.
 * - Strict seeking: Targets before the start or past the end throw SeekBufferError.
 *
 * @example
 * ```typescript
 * const buffer = new SyncInMemorySeekableBuffer();
 * buffer.write(new Uint8Array([1, 2, 3, 4]));
 * buffer.seek(0, SeekOrigin.Begin);
 * buffer.write(new Uint8Array([9]));
 * buffer.toUint8Array(); // Uint8Array([9, 2, 3, 4])
 * ```
 */
export class SyncInMemorySeekableBuffer implements ISyncSeekableStream {
  #view: Uint8Array;
  #length: number;
  #position = 0;

  /**
   * Creates a medium holding a copy of `initial`, or an empty medium with the
   * given initial capacity. The cursor starts at offset 0.
   */
  constructor(initial: Uint8Array | number = DEFAULT_CAPACITY) {
    if (typeof initial === "number") {
      if (!Number.isInteger(initial) || initial < 0) {
        throw new RangeError(
          `Initial capacity must be a non-negative integer. Got ${initial}`,
        );
      }
      this.#view = new Uint8Array(initial);
      this.#length = 0;
    } else {
      this.#view = initial.slice();
      this.#length = initial.length;
    }
  }

  /**
   * Returns the number of bytes held by the medium.
   */
  public length(): number {
    return this.#length;
  }

  public seek(offset: number, origin: SeekOrigin): number {
    const target = resolveSeekTarget(
      offset,
      origin,
      this.#position,
      this.#length,
    );
    if (!Number.isInteger(target) || target < 0 || target > this.#length) {
      throw new SeekBufferError(
        `Seek target out of bounds. target=${target}, bufferLength=${this.#length}`,
        target,
        this.#length,
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
        this.#length,
      );
    }
    const end = Math.min(this.#position + size, this.#length);
    const result = this.#view.slice(this.#position, end);
    this.#position = end;
    return result;
  }

  public write(data: Uint8Array): number {
    const end = this.#position + data.length;
    this.ensureCapacity(end);
    this.#view.set(data, this.#position);
    this.#position = end;
    if (end > this.#length) {
      this.#length = end;
    }
    return data.length;
  }

  /**
   * Returns a copy of the bytes held by the medium.
   */
  public toUint8Array(): Uint8Array {
    return this.#view.slice(0, this.#length);
  }

  private ensureCapacity(minCapacity: number): void {
    if (minCapacity <= this.#view.length) {
      return;
    }
    const grown = new Uint8Array(
      Math.max(minCapacity, this.#view.length * 2),
    );
    grown.set(this.#view.subarray(0, this.#length));
    this.#view = grown;
  }
}
