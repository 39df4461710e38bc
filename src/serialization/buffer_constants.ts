/** Byte widths of the fixed-width encodings. */
export const U8_SIZE = 1;
export const U16_SIZE = 2;
export const U32_SIZE = 4;
export const I32_SIZE = 4;
export const U64_SIZE = 8;

/**
 * Upper bound on the groups in a 7-bit encoded 32-bit integer: 32 bits at
 * 7 payload bits per byte.
 */
export const MAX_7BIT_INT_BYTES = 5;

export const U8_MAX = 0xff;
export const U16_MAX = 0xffff;
export const U32_MAX = 0xffffffff;
export const U64_MAX = 0xffffffffffffffffn;
export const I32_MIN = -2147483648;
export const I32_MAX = 2147483647;

/**
 * Returns how many bytes `write7BitInt` emits for `value`, read as the
 * unsigned bit pattern of a 32-bit integer.
 */
export function encoded7BitIntLength(value: number): number {
  let n = value >>> 0;
  let size = 1;
  while (n >= 0x80) {
    size++;
    n >>>= 7;
  }
  return size;
}
