/**
 * Reference point for a relative seek offset.
 */
export const SeekOrigin = {
  /** Offsets are measured from the start of the stream. */
  Begin: "begin",
  /** Offsets are measured from the current cursor position. */
  Current: "current",
  /** Offsets are measured from the end of the stream. */
  End: "end",
} as const;

export type SeekOrigin = typeof SeekOrigin[keyof typeof SeekOrigin];

/**
 * Byte order of a multi-byte value. The fixed-width codecs only write
 * little-endian.
 */
export const Endianness = {
  /** Least significant byte at the lowest offset. */
  Little: "little",
  /** Most significant byte at the lowest offset. */
  Big: "big",
} as const;

export type Endianness = typeof Endianness[keyof typeof Endianness];

/**
 * Resolves a seek request against the current position and length of a
 * medium, returning the absolute target offset. The caller validates the
 * result against its own bounds.
 */
export function resolveSeekTarget(
  offset: number,
  origin: SeekOrigin,
  position: number,
  length: number,
): number {
  switch (origin) {
    case SeekOrigin.Begin:
      return offset;
    case SeekOrigin.Current:
      return position + offset;
    case SeekOrigin.End:
      return length + offset;
  }
}
