/**
 * Errors thrown by seekable media.
 *
 * These are raised by the medium itself. The reader and writer catch them and
 * translate them into the codec's `BufferError` results.
 */

/** Error thrown when a medium read fails. */
export class ReadBufferError extends RangeError {
  /** The offset where the read operation failed. */
  public readonly offset: number;
  /** The size requested for the read operation. */
  public readonly size: number;
  /** The total medium length (or best-effort upper bound). */
  public readonly bufferLength: number;

  constructor(
    message: string,
    offset: number,
    size: number,
    bufferLength: number,
  ) {
    super(message);
    this.name = "ReadBufferError";
    this.offset = offset;
    this.size = size;
    this.bufferLength = bufferLength;
  }
}

/** Error thrown when a medium cannot move its cursor to the requested place. */
export class SeekBufferError extends RangeError {
  /** The absolute position the seek resolved to. */
  public readonly target: number;
  /** The total medium length. */
  public readonly bufferLength: number;

  constructor(message: string, target: number, bufferLength: number) {
    super(message);
    this.name = "SeekBufferError";
    this.target = target;
    this.bufferLength = bufferLength;
  }
}
