/**
 * Reads an unsigned little-endian integer of up to four bytes from `bytes`
 * starting at `offset`.
 */
export function readUIntLE(
  bytes: Uint8Array,
  offset: number,
  byteLength: number,
): number {
  let value = 0;
  for (let i = 0; i < byteLength; i++) {
    const index = offset + i;
    if (index >= bytes.length) {
      break;
    }
    value |= (bytes[index] ?? 0) << (8 * i);
  }
  return value >>> 0;
}

/**
 * Encodes the low `byteLength` bytes of `value` least-significant first.
 */
export function writeUIntLE(value: number, byteLength: number): Uint8Array {
  const bytes = new Uint8Array(byteLength);
  for (let i = 0; i < byteLength; i++) {
    bytes[i] = (value >>> (8 * i)) & 0xff;
  }
  return bytes;
}
