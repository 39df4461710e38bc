/**
 * Error taxonomy shared by {@link BufferReader} and {@link BufferWriter}.
 *
 * Every fallible codec operation returns one of these inside a failed
 * `Result` instead of throwing, so callers can tell a short stream apart from
 * a fault in the underlying medium.
 */

/** A seek could not be satisfied by the underlying medium. */
export class IndexOutOfRangeError extends Error {
  public readonly kind = "IndexOutOfRange" as const;
  /** The signed offset passed to the failed seek. */
  public readonly index: number;

  constructor(index: number, cause?: unknown) {
    super(`Seek to index ${index} is out of range.`, { cause });
    this.name = "IndexOutOfRangeError";
    this.index = index;
  }
}

/**
 * Fewer bytes remain than a fixed-size or counted read requires. Raised before
 * the medium is touched, so nothing was consumed.
 */
export class EndOfStreamError extends Error {
  public readonly kind = "EndOfStream" as const;
  /** The offset the read would have started at. */
  public readonly offset: number;
  /** The number of bytes requested. */
  public readonly size: number;
  /** The stream length at the time of the check. */
  public readonly streamLength: number;

  constructor(offset: number, size: number, streamLength: number) {
    super(
      `End of stream. offset=${offset}, size=${size}, streamLength=${streamLength}`,
    );
    this.name = "EndOfStreamError";
    this.offset = offset;
    this.size = size;
    this.streamLength = streamLength;
  }
}

/**
 * The medium's read primitive failed even though enough bytes were declared.
 */
export class ReadFailureError extends Error {
  public readonly kind = "ReadFailure" as const;
  /** The lower-level error raised by the medium. */
  public readonly error: unknown;

  constructor(error: unknown) {
    const detail = error instanceof Error ? error.message : String(error);
    super(`Read from underlying medium failed: ${detail}`, { cause: error });
    this.name = "ReadFailureError";
    this.error = error;
  }
}

/**
 * Catch-all for write failures and corrupt data: an overlong variable-length
 * integer, a negative string length or invalid UTF-8.
 */
export class IOFailureError extends Error {
  public readonly kind = "IOFailure" as const;

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "IOFailureError";
  }
}

export type BufferError =
  | IndexOutOfRangeError
  | EndOfStreamError
  | ReadFailureError
  | IOFailureError;

export type BufferErrorKind = BufferError["kind"];
